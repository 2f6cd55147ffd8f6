import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { Observable, Subject } from 'rxjs';
import { RelayConfig } from '../../config/configuration';
import { toError } from '../../utils/common';
import { metrics } from '../../utils/metrics';
import { ExtendedLoggerService } from '../logger/logger.interface';
import { isRelayCommand, LostCommand, RELAY_TRANSPORT, RelayDispatcher, RelayTransport } from './relay.types';
import { BoundedRetryPolicy } from './retry-policy';

/**
 * Forwards commands to the relay controller one at a time.
 *
 * A failed write is retried after closing and reopening the transport; once
 * the retry policy gives up the command is published on `lostCommands$`.
 * `send` never rejects.
 */
@Injectable()
export class RelayDispatcherService implements RelayDispatcher, OnApplicationBootstrap, OnModuleDestroy {
  private readonly retryPolicy: BoundedRetryPolicy;
  private readonly forwardUnknown: boolean;
  private readonly lostCommands = new Subject<LostCommand>();
  private queue: Promise<unknown> = Promise.resolve();
  private commandsSent = 0;

  constructor(
    @Inject(WINSTON_MODULE_NEST_PROVIDER)
    private readonly logger: ExtendedLoggerService,
    private readonly configService: ConfigService,
    @Inject(RELAY_TRANSPORT)
    private readonly transport: RelayTransport,
  ) {
    const config = this.configService.get<RelayConfig>('app.relay');
    this.retryPolicy = new BoundedRetryPolicy(config?.maxAttempts ?? 2, config?.retryDelayMs ?? 500);
    this.forwardUnknown = config?.forwardUnknown ?? false;
  }

  get transportName(): string {
    return this.transport.name;
  }

  get sentCount(): number {
    return this.commandsSent;
  }

  get messages$(): Observable<string> {
    return this.transport.messages$;
  }

  get lostCommands$(): Observable<LostCommand> {
    return this.lostCommands.asObservable();
  }

  async onApplicationBootstrap(): Promise<void> {
    if (this.transport.name === 'none') {
      this.logger.log('Relay transport disabled, commands will not be forwarded', RelayDispatcherService.name);
      return;
    }

    try {
      await this.transport.open();
    } catch (error) {
      // Reopened lazily on the first command
      this.logger.warn(`Relay transport ${this.transport.name} not available: ${toError(error).message}`, RelayDispatcherService.name);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.queue;
    await this.transport.close();
    this.lostCommands.complete();
  }

  isConnected(): boolean {
    return this.transport.isOpen();
  }

  send(command: string): Promise<boolean> {
    const result = this.queue.then(() => this.dispatch(command));
    this.queue = result;
    return result;
  }

  private async dispatch(command: string): Promise<boolean> {
    const line = this.toLine(command);
    if (line === null) {
      this.logger.warn(`Discarding non-relay command "${command}"`, RelayDispatcherService.name);
      metrics.relayDispatches.inc({ command: 'UNKNOWN', result: 'discarded' });
      return false;
    }

    const outcome = await this.retryPolicy.run(
      async () => {
        if (!this.transport.isOpen()) {
          await this.transport.open();
        }
        await this.transport.write(line);
      },
      async (attempt, lastError) => {
        this.logger.warn(
          `Relay write failed (${lastError.message}), reconnecting for attempt ${attempt}/${this.retryPolicy.maxAttempts}`,
          RelayDispatcherService.name,
        );
        await this.transport.close();
        await this.transport.open();
      },
    );

    const label = isRelayCommand(line) ? line : 'UNKNOWN';

    if (outcome.ok) {
      this.commandsSent++;
      metrics.relayDispatches.inc({ command: label, result: 'sent' });
      this.logger.log(`Relay command sent: ${line} (attempts=${outcome.attempts})`, RelayDispatcherService.name);
      return true;
    }

    metrics.relayDispatches.inc({ command: label, result: 'lost' });
    metrics.relayLostCommands.inc();
    this.logger.error(
      `❌ Relay command lost after ${outcome.attempts} attempt(s): ${line}`,
      outcome.error.stack,
      RelayDispatcherService.name,
    );
    this.lostCommands.next({
      command: line,
      attempts: outcome.attempts,
      reason: outcome.error.message,
      timestamp: new Date(),
    });
    return false;
  }

  /**
   * Canonical commands are sent uppercased; anything else only with forwardUnknown.
   */
  private toLine(command: string): string | null {
    const text = command.trim();
    const upper = text.toUpperCase();
    if (isRelayCommand(upper)) {
      return upper;
    }
    return this.forwardUnknown && text.length > 0 ? text : null;
  }
}
