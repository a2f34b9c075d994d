import { Test, TestingModule } from '@nestjs/testing';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from '../health.controller';
import { TransactionStoreHealthIndicator } from '../transaction.health';
import { CertificateHealthIndicator } from '../../certificate/certificate.health';
import { TransactionStorageService } from '../../transaction/transaction-storage.service';

describe('HealthController', () => {
  let controller: HealthController;
  const certificateHealthIndicator = { isHealthy: jest.fn() };
  const transactionStorage = { countActive: jest.fn(), size: jest.fn() };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [TerminusModule],
      controllers: [HealthController],
      providers: [
        TransactionStoreHealthIndicator,
        { provide: TransactionStorageService, useValue: transactionStorage },
        { provide: CertificateHealthIndicator, useValue: certificateHealthIndicator },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('reports server, signing and transaction store', async () => {
    certificateHealthIndicator.isHealthy.mockReturnValue({
      signing: { status: 'up', mode: 'fallback', reason: 'Cannot read certificate certs/acs-cert.pem' },
    });
    transactionStorage.countActive.mockReturnValue(2);
    transactionStorage.size.mockReturnValue(3);

    const result = await controller.check();

    expect(result.status).toBe('ok');
    expect(result.details).toEqual({
      server: { status: 'up' },
      signing: { status: 'up', mode: 'fallback', reason: 'Cannot read certificate certs/acs-cert.pem' },
      transactions: { status: 'up', active: 2, stored: 3 },
    });
    expect(certificateHealthIndicator.isHealthy).toHaveBeenCalledWith('signing');
  });
});
