import { Registry, Counter, Gauge, collectDefaultMetrics } from 'prom-client';

export class MetricsService {
  private registry: Registry;

  // Frame metrics
  public framesSent: Counter<string>;
  public framesReceived: Counter<string>;
  public checksumMismatches: Counter<string>;
  public malformedFrames: Counter<string>;
  public discardedBytes: Counter<string>;

  // Session metrics
  public connectionAttempts: Counter<string>;
  public connectionFailures: Counter<string>;
  public reconnectsScheduled: Counter<string>;
  public sessionState: Gauge<string>;

  // Relay metrics
  public relayDispatches: Counter<string>;
  public relayLostCommands: Counter<string>;

  constructor() {
    this.registry = new Registry();

    this.framesSent = new Counter({
      name: 'gt06_frames_sent_total',
      help: 'Total number of GT06 frames written to the server',
      labelNames: ['packet_type'],
      registers: [this.registry],
    });

    this.framesReceived = new Counter({
      name: 'gt06_frames_received_total',
      help: 'Total number of GT06 frames received from the server',
      labelNames: ['packet_type'],
      registers: [this.registry],
    });

    this.checksumMismatches = new Counter({
      name: 'gt06_checksum_mismatches_total',
      help: 'Inbound frames whose check field did not match',
      registers: [this.registry],
    });

    this.malformedFrames = new Counter({
      name: 'gt06_malformed_frames_total',
      help: 'Spurious start markers skipped by the parser',
      registers: [this.registry],
    });

    this.discardedBytes = new Counter({
      name: 'gt06_discarded_bytes_total',
      help: 'Bytes dropped while resynchronising on a start marker',
      registers: [this.registry],
    });

    this.connectionAttempts = new Counter({
      name: 'tracker_connection_attempts_total',
      help: 'TCP connection attempts to the tracking server',
      registers: [this.registry],
    });

    this.connectionFailures = new Counter({
      name: 'tracker_connection_failures_total',
      help: 'Failed or lost TCP connections',
      labelNames: ['reason'],
      registers: [this.registry],
    });

    this.reconnectsScheduled = new Counter({
      name: 'tracker_reconnects_scheduled_total',
      help: 'Reconnect attempts scheduled after a lost connection',
      registers: [this.registry],
    });

    this.sessionState = new Gauge({
      name: 'tracker_session_state',
      help: 'Current session state (1 for the active state, 0 otherwise)',
      labelNames: ['state'],
      registers: [this.registry],
    });

    this.relayDispatches = new Counter({
      name: 'relay_dispatch_total',
      help: 'Commands forwarded to the relay controller',
      labelNames: ['command', 'result'],
      registers: [this.registry],
    });

    this.relayLostCommands = new Counter({
      name: 'relay_lost_commands_total',
      help: 'Relay commands abandoned after exhausting retries',
      registers: [this.registry],
    });

    if (process.env.NODE_ENV !== 'test') {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  setSessionState(states: readonly string[], active: string): void {
    for (const state of states) {
      this.sessionState.set({ state }, state === active ? 1 : 0);
    }
  }

  getRegistry(): Registry {
    return this.registry;
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}

// Singleton instance
export const metrics = new MetricsService();
