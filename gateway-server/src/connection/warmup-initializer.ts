import { errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/retry.js';
import type { ConnectionManager } from './connection-manager.js';

export interface WarmupInitializerOptions {
  connection: Pick<ConnectionManager, 'open' | 'snapshot'>;
  delayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Opens the logical connection in the background after a grace period, so the
 * cluster has time to come up and the first request finds the connection
 * ready. A failed warm-up only logs: the next request opens on demand.
 */
export class WarmupInitializer {
  private readonly connection: Pick<ConnectionManager, 'open' | 'snapshot'>;
  private readonly delayMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly abort = new AbortController();
  private run: Promise<void> | null = null;

  constructor(options: WarmupInitializerOptions) {
    this.connection = options.connection;
    this.delayMs = options.delayMs ?? 30000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? console;
  }

  /**
   * Start the warm-up once. Later calls return the same run. The promise
   * always resolves.
   */
  start(): Promise<void> {
    if (!this.run) {
      this.run = this.warmUp();
    }
    return this.run;
  }

  stop(): void {
    this.abort.abort();
  }

  private async warmUp(): Promise<void> {
    this.logger.log(`⏳ Waiting for HBase/Phoenix to finish initializing (${this.delayMs / 1000} seconds)...`);

    try {
      await this.sleep(this.delayMs, this.abort.signal);
    } catch (error) {
      if (this.abort.signal.aborted) {
        this.logger.log('Warm-up cancelled before connecting');
        return;
      }
      this.logger.warn(`Warm-up grace period interrupted: ${errorMessage(error)}`);
    }

    if (this.abort.signal.aborted) {
      this.logger.log('Warm-up cancelled before connecting');
      return;
    }

    try {
      this.logger.log('Initializing Phoenix connection...');
      await this.connection.open();
      const { activeTransportKind } = this.connection.snapshot();
      this.logger.log(`✅ Phoenix connection initialized (${activeTransportKind === 'Driver' ? 'ODBC driver' : 'JSON protocol'})`);
    } catch (error) {
      this.logger.warn(
        `⚠️ Failed to connect to Phoenix during warm-up: ${errorMessage(error)}. The connection will be attempted on the first request.`
      );
    }
  }
}
