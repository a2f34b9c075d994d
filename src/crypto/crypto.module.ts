import { Module } from '@nestjs/common';
import { CertificateModule } from '../certificate/certificate.module';
import { AcsSignedContentService } from './acs-signed-content.service';
import { EphemeralKeyService } from './ephemeral-key.service';
import { KeyDerivationService } from './key-derivation.service';
import { A128CbcHs256Codec } from './jwe/a128cbc-hs256.codec';
import { A128GcmCodec } from './jwe/a128gcm.codec';
import { JWE_CODECS, JweService } from './jwe/jwe.service';

/**
 * Challenge-channel cryptography: ephemeral keys, ECDH/ConcatKDF, JWE and
 * ACS signed content.
 */
@Module({
  imports: [CertificateModule],
  providers: [
    { provide: JWE_CODECS, useValue: [new A128CbcHs256Codec(), new A128GcmCodec()] },
    EphemeralKeyService,
    KeyDerivationService,
    JweService,
    AcsSignedContentService,
  ],
  exports: [EphemeralKeyService, KeyDerivationService, JweService, AcsSignedContentService],
})
export class CryptoModule {}
