import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_TRANSACTION_TTL } from '../config/config.constants';
import { TransactionNotFoundError } from './transaction.errors';
import type { StoredTransaction, TransactionRecord } from './interfaces';

/**
 * In-process transaction store with per-record expiry.
 *
 * Records are keyed by threeDSServerTransID; a secondary index resolves
 * the acsTransID carried as `kid` on the challenge channel. Expired
 * records are invisible to reads before the sweep removes them.
 */
@Injectable()
export class TransactionStorageService {
  private readonly logger = new Logger(TransactionStorageService.name);
  private transactions = new Map<string, StoredTransaction>(); // Map<threeDsServerTransId, StoredTransaction>
  private acsIndex = new Map<string, string>(); // Map<acsTransId, threeDsServerTransId>
  private readonly defaultTtlSeconds: number;

  constructor(private readonly configService: ConfigService) {
    this.defaultTtlSeconds = this.configService.get<number>('tds.transaction.ttl', DEFAULT_TRANSACTION_TTL);
  }

  /**
   * Store a transaction, replacing any previous record under the same ID.
   */
  put(id: string, record: TransactionRecord, ttlSeconds: number = this.defaultTtlSeconds): void {
    const previous = this.transactions.get(id);
    if (previous && previous.record.acsTransId !== record.acsTransId) {
      this.acsIndex.delete(previous.record.acsTransId);
    }

    const expiresAt = Date.now() + ttlSeconds * 1000;
    this.transactions.set(id, { record, expiresAt });
    this.acsIndex.set(record.acsTransId, id);
    this.logger.debug(`Transaction stored: ${id} (acsTransID=${record.acsTransId}, ttl=${ttlSeconds}s)`);
  }

  get(id: string): TransactionRecord | undefined {
    const stored = this.transactions.get(id);
    if (!stored || stored.expiresAt <= Date.now()) {
      return undefined;
    }
    return stored.record;
  }

  /**
   * Replace the record of a live transaction. The original expiry is kept.
   *
   * @throws {TransactionNotFoundError} If the transaction is unknown or expired
   */
  update(id: string, record: TransactionRecord): void {
    const stored = this.transactions.get(id);
    if (!stored || stored.expiresAt <= Date.now()) {
      throw new TransactionNotFoundError(id);
    }

    if (stored.record.acsTransId !== record.acsTransId) {
      this.acsIndex.delete(stored.record.acsTransId);
      this.acsIndex.set(record.acsTransId, id);
    }
    this.transactions.set(id, { record, expiresAt: stored.expiresAt });
  }

  delete(id: string): boolean {
    const stored = this.transactions.get(id);
    if (!stored) {
      return false;
    }
    this.transactions.delete(id);
    this.acsIndex.delete(stored.record.acsTransId);
    return true;
  }

  findByAcsTransId(acsTransId: string): TransactionRecord | undefined {
    const id = this.acsIndex.get(acsTransId);
    return id === undefined ? undefined : this.get(id);
  }

  /**
   * Remove every record whose expiry is at or before `now`.
   *
   * @returns Number of records removed
   */
  purgeExpired(now: number = Date.now()): number {
    let removed = 0;
    for (const [id, stored] of this.transactions) {
      if (stored.expiresAt <= now) {
        this.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.log(`Purged ${removed} expired transaction(s)`);
    }
    return removed;
  }

  /** Number of records that have not expired at `now`. */
  countActive(now: number = Date.now()): number {
    let active = 0;
    for (const stored of this.transactions.values()) {
      if (stored.expiresAt > now) {
        active++;
      }
    }
    return active;
  }

  /** Number of stored records, including expired ones not yet swept. */
  size(): number {
    return this.transactions.size;
  }
}
