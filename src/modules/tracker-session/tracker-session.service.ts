import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { Observable, Subject } from 'rxjs';
import { Duplex } from 'stream';
import { DeviceConfig, ProtocolConfig, ReconnectConfig, TrackerConfig } from '../../config/configuration';
import { toError } from '../../utils/common';
import { generateImei } from '../../utils/imei';
import { metrics } from '../../utils/metrics';
import { LOCATION_SOURCE, LocationFix, LocationSource, isUsableFix } from '../location/location.types';
import { ExtendedLoggerService } from '../logger/logger.interface';
import { interpretCommand, toRelayCommand } from '../protocols/gt06/gt06.command';
import { isValidImei, toHex } from '../protocols/gt06/gt06.codec';
import { GT06Decoder, protocolName } from '../protocols/gt06/gt06.decoder';
import { GT06Encoder } from '../protocols/gt06/gt06.encoder';
import { ConnectionError, InvalidConfigError } from '../protocols/gt06/gt06.errors';
import { DEFAULT_SATELLITES, GT06AlarmType, GT06Command, GT06MessageType, ServerPacket } from '../protocols/gt06/gt06.types';
import { SerialCounter } from '../protocols/gt06/serial-counter';
import { RELAY_DISPATCHER, RelayDispatcher } from '../relay/relay.types';
import { ReconnectPolicy } from './reconnect-policy';
import {
  MAX_INTERVAL_SECONDS,
  SOCKET_CONNECTOR,
  SessionConfig,
  SessionEvent,
  SessionState,
  SessionStats,
  SocketConnector,
} from './tracker-session.types';

type TimerKind = 'heartbeat' | 'location' | 'reconnect' | 'login-timeout';

const ACTIVE_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.CONNECTING,
  SessionState.CONNECTED,
  SessionState.LOGGING_IN,
  SessionState.ONLINE,
]);

const ALL_STATES = Object.values(SessionState);

const DEFAULT_TRACKER: TrackerConfig = {
  serverAddress: '',
  serverPort: 5023,
  heartbeatIntervalSeconds: 30,
  locationIntervalSeconds: 10,
  autoConnect: false,
  connectTimeoutMs: 15000,
  loginTimeoutSeconds: 30,
  replyWithCommandResponse: false,
};

const DEFAULT_DEVICE: DeviceConfig = { accOn: true, voltageLevel: 4, gsmSignal: 4 };

const emptyStats = (): SessionStats => ({
  packetsSent: 0,
  packetsReceived: 0,
  heartbeatsSent: 0,
  locationsSent: 0,
  commandsReceived: 0,
  connectedSince: null,
  lastActivity: null,
});

/**
 * Client side of a GT06 session against a Traccar compatible server.
 *
 * Owns the socket, the receive buffer and the serial counter. Everything runs
 * on the event loop, so socket callbacks and timer ticks never interleave
 * inside a frame write.
 */
@Injectable()
export class TrackerSessionService implements OnApplicationBootstrap, OnModuleDestroy {
  private state = SessionState.DISCONNECTED;
  private config: SessionConfig | null = null;
  private socket: Duplex | null = null;
  private detachSocket: (() => void) | null = null;
  private receiveBuffer: Buffer = Buffer.alloc(0);
  private stats = emptyStats();
  private lastFix: LocationFix | null = null;
  private gpsPositioned = false;
  private reconnectAttempt = 0;
  private userDisconnected = false;
  private connectAttemptId = 0;

  private readonly events = new Subject<SessionEvent>();
  private readonly serialCounter = new SerialCounter();
  private readonly encoder: GT06Encoder;
  private readonly decoder: GT06Decoder;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly tracker: TrackerConfig;
  private readonly device: DeviceConfig;
  private readonly defaultImei: string;
  private readonly imeiGenerated: boolean;

  constructor(
    @Inject(WINSTON_MODULE_NEST_PROVIDER)
    private readonly logger: ExtendedLoggerService,
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(LOCATION_SOURCE)
    private readonly locationSource: LocationSource,
    @Inject(RELAY_DISPATCHER)
    private readonly relay: RelayDispatcher,
    @Inject(SOCKET_CONNECTOR)
    private readonly connectSocket: SocketConnector,
  ) {
    const profile = this.configService.get<ProtocolConfig>('app.protocol') ?? {};
    this.encoder = new GT06Encoder(this.serialCounter, profile);
    this.decoder = new GT06Decoder(profile);
    this.reconnectPolicy = new ReconnectPolicy(this.configService.get<ReconnectConfig>('app.reconnect'));
    this.tracker = { ...DEFAULT_TRACKER, ...this.configService.get<TrackerConfig>('app.tracker') };
    this.device = { ...DEFAULT_DEVICE, ...this.configService.get<DeviceConfig>('app.device') };

    this.imeiGenerated = !this.tracker.imei;
    this.defaultImei = this.tracker.imei || generateImei();
  }

  onApplicationBootstrap(): void {
    if (this.imeiGenerated) {
      this.logger.warn(`No TRACKER_IMEI configured, using generated IMEI ${this.defaultImei}`, TrackerSessionService.name);
    }

    if (!this.tracker.autoConnect) {
      return;
    }

    if (!this.tracker.serverAddress) {
      this.logger.warn('Auto-connect skipped: TRACKER_SERVER_HOST is not set', TrackerSessionService.name);
      return;
    }

    try {
      this.runAsync('Auto-connect', this.connect(this.resolveConfig()));
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Auto-connect rejected: ${err.message}`, err.stack, TrackerSessionService.name);
    }
  }

  onModuleDestroy(): void {
    this.disconnect();
    this.events.complete();
  }

  get events$(): Observable<SessionEvent> {
    return this.events.asObservable();
  }

  getState(): SessionState {
    return this.state;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  getConfig(): SessionConfig | null {
    return this.config ? { ...this.config } : null;
  }

  getLastFix(): LocationFix | null {
    return this.lastFix;
  }

  get imei(): string {
    return this.config?.imei ?? this.defaultImei;
  }

  /**
   * Configured session settings with `overrides` applied on top.
   */
  resolveConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
    return {
      serverAddress: overrides.serverAddress ?? this.tracker.serverAddress,
      serverPort: overrides.serverPort ?? this.tracker.serverPort,
      imei: overrides.imei ?? this.defaultImei,
      heartbeatIntervalSeconds: overrides.heartbeatIntervalSeconds ?? this.tracker.heartbeatIntervalSeconds,
      locationIntervalSeconds: overrides.locationIntervalSeconds ?? this.tracker.locationIntervalSeconds,
    };
  }

  /**
   * Starts a new login sequence. Throws {@link InvalidConfigError} before any I/O;
   * connection failures are reported through state and events, never thrown.
   */
  connect(config: SessionConfig): Promise<void> {
    this.validate(config);

    if (ACTIVE_STATES.has(this.state)) {
      this.logger.warn(`connect() ignored, session is ${this.state}`, TrackerSessionService.name);
      return Promise.resolve();
    }

    this.cancelTimers('heartbeat', 'location', 'reconnect', 'login-timeout');
    this.config = { ...config, serverAddress: config.serverAddress.trim() };
    this.userDisconnected = false;
    this.reconnectAttempt = 0;
    this.serialCounter.reset();

    return this.openConnection();
  }

  /**
   * User initiated: no reconnect follows.
   */
  disconnect(): void {
    this.userDisconnected = true;
    this.connectAttemptId++;
    this.cancelTimers('heartbeat', 'location', 'reconnect', 'login-timeout');
    this.receiveBuffer = Buffer.alloc(0);
    this.releaseSocket();
    this.setState(SessionState.DISCONNECTED);
    this.stats = emptyStats();
    this.reconnectAttempt = 0;
  }

  sendHeartbeat(): boolean {
    if (this.state !== SessionState.ONLINE) {
      return false;
    }

    const frame = this.encoder.buildHeartbeat({
      accOn: this.device.accOn,
      gpsPositioned: this.gpsPositioned,
      voltageLevel: this.device.voltageLevel,
      gsmSignal: this.device.gsmSignal,
      alarmType: GT06AlarmType.NORMAL,
    });

    if (!this.write(frame, 'HEARTBEAT')) {
      return false;
    }
    this.stats.heartbeatsSent++;
    return true;
  }

  /**
   * Pulls the current fix and reports it. Resolves to false when offline or
   * without a usable fix.
   */
  async sendLocation(): Promise<boolean> {
    const fix = await this.currentFix();
    if (!fix) {
      return false;
    }

    const frame = this.encoder.buildLocation({
      latitude: fix.latitude,
      longitude: fix.longitude,
      speedKmh: fix.speedKmh,
      courseDeg: fix.headingDeg,
      timestamp: fix.timestamp,
      satellites: fix.satellites ?? DEFAULT_SATELLITES,
      gpsValid: true,
      accOn: this.device.accOn,
    });

    if (!this.write(frame, 'LOCATION')) {
      return false;
    }
    this.stats.locationsSent++;
    return true;
  }

  async sendAlarm(alarmType: GT06AlarmType | number): Promise<boolean> {
    const fix = await this.currentFix();
    if (!fix) {
      this.logger.warn(`Alarm 0x${alarmType.toString(16)} not sent: no GPS fix or session offline`, TrackerSessionService.name);
      return false;
    }

    const frame = this.encoder.buildAlarm({
      alarmType,
      latitude: fix.latitude,
      longitude: fix.longitude,
      speedKmh: fix.speedKmh,
      courseDeg: fix.headingDeg,
      timestamp: fix.timestamp,
      satellites: fix.satellites,
    });

    return this.write(frame, 'ALARM');
  }

  private validate(config: SessionConfig): void {
    if (!isValidImei(config.imei)) {
      throw new InvalidConfigError(`IMEI must be exactly 15 digits, got "${config.imei}"`);
    }
    if (!config.serverAddress || config.serverAddress.trim().length === 0) {
      throw new InvalidConfigError('Server address must not be empty');
    }
    if (!Number.isInteger(config.serverPort) || config.serverPort < 1 || config.serverPort > 65535) {
      throw new InvalidConfigError(`Invalid server port ${config.serverPort}`);
    }
    for (const interval of [config.heartbeatIntervalSeconds, config.locationIntervalSeconds]) {
      if (!(interval > 0) || interval > MAX_INTERVAL_SECONDS) {
        throw new InvalidConfigError(`Heartbeat and location intervals must be between 1 and ${MAX_INTERVAL_SECONDS} seconds`);
      }
    }
  }

  private async openConnection(): Promise<void> {
    const config = this.config;
    if (!config) {
      return;
    }

    const attemptId = ++this.connectAttemptId;
    this.setState(SessionState.CONNECTING);
    metrics.connectionAttempts.inc();
    this.logger.log(`Connecting to ${config.serverAddress}:${config.serverPort} as ${config.imei}`, TrackerSessionService.name);

    let socket: Duplex;
    try {
      socket = await this.connectSocket(config.serverAddress, config.serverPort, this.tracker.connectTimeoutMs);
    } catch (error) {
      if (attemptId !== this.connectAttemptId) {
        return;
      }
      const cause = toError(error);
      const connectionError =
        cause instanceof ConnectionError ? cause : new ConnectionError(`Connection failed: ${cause.message}`, cause);
      this.handleConnectionLost('connect failed', connectionError);
      return;
    }

    // disconnect() or a newer attempt won the race
    if (attemptId !== this.connectAttemptId) {
      socket.destroy();
      return;
    }

    this.attachSocket(socket);
    this.receiveBuffer = Buffer.alloc(0);
    this.stats = emptyStats();
    this.stats.connectedSince = new Date();
    this.setState(SessionState.CONNECTED);

    this.write(this.encoder.buildLogin(config.imei), 'LOGIN');
    this.setState(SessionState.LOGGING_IN);
    this.addTimeout('login-timeout', this.tracker.loginTimeoutSeconds * 1000, () => {
      if (this.state === SessionState.LOGGING_IN) {
        this.handleConnectionLost(
          'login timeout',
          new ConnectionError(`No login acknowledgement within ${this.tracker.loginTimeoutSeconds}s`),
        );
      }
    });
  }

  private attachSocket(socket: Duplex): void {
    const onData = (chunk: Buffer | string): void => {
      this.onData(socket, Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    };
    const onError = (error: Error): void => {
      if (this.socket === socket) {
        this.handleConnectionLost('socket error', error);
      }
    };
    const onEnd = (): void => {
      if (this.socket === socket) {
        this.handleConnectionLost('closed by server');
      }
    };

    socket.on('data', onData);
    socket.on('error', onError);
    socket.on('end', onEnd);
    socket.on('close', onEnd);

    this.socket = socket;
    this.detachSocket = () => {
      socket.off('data', onData);
      socket.off('error', onError);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
    };
  }

  private releaseSocket(): void {
    const socket = this.socket;
    this.socket = null;
    this.detachSocket?.();
    this.detachSocket = null;

    if (socket && !socket.destroyed) {
      socket.once('error', (error: Error) => {
        this.logger.debug(`Error on released socket: ${error.message}`, TrackerSessionService.name);
      });
      socket.destroy();
    }
  }

  private handleConnectionLost(reason: string, error?: Error): void {
    this.cancelTimers('heartbeat', 'location', 'login-timeout');
    this.receiveBuffer = Buffer.alloc(0);
    this.releaseSocket();
    metrics.connectionFailures.inc({ reason });

    if (error) {
      this.logger.error(`Connection lost (${reason}): ${error.message}`, error.stack, TrackerSessionService.name);
      this.events.next({ type: 'connectionError', error });
      this.setState(SessionState.ERROR);
    } else {
      this.logger.warn(`Connection lost (${reason})`, TrackerSessionService.name);
    }

    this.setState(SessionState.DISCONNECTED);

    if (!this.userDisconnected) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (!this.config) {
      return;
    }

    const attempt = this.reconnectAttempt++;
    const delayMs = this.reconnectPolicy.delayFor(attempt);
    metrics.reconnectsScheduled.inc();
    this.logger.log(`Reconnecting in ${delayMs} ms (attempt ${attempt + 1})`, TrackerSessionService.name);
    this.events.next({ type: 'reconnectScheduled', attempt: attempt + 1, delayMs });

    this.addTimeout('reconnect', delayMs, () => {
      this.cancelTimers('reconnect');
      if (this.state === SessionState.DISCONNECTED && !this.userDisconnected) {
        this.runAsync('Reconnect', this.openConnection());
      }
    });
  }

  private onData(socket: Duplex, chunk: Buffer): void {
    this.receiveBuffer = this.receiveBuffer.length > 0 ? Buffer.concat([this.receiveBuffer, chunk]) : chunk;

    const { packets, remaining, issues } = this.decoder.decode(this.receiveBuffer);
    this.receiveBuffer = remaining;

    for (const issue of issues) {
      if (issue.kind === 'MALFORMED_FRAME') {
        metrics.malformedFrames.inc();
      } else {
        metrics.discardedBytes.inc(issue.byteCount);
      }
      this.events.next({ type: 'malformedFrame', issue });
    }

    for (const packet of packets) {
      // A handler may have dropped the connection
      if (this.socket !== socket) {
        return;
      }
      this.handlePacket(packet);
    }
  }

  private handlePacket(packet: ServerPacket): void {
    const packetType = protocolName(packet.protocolNumber);
    this.stats.packetsReceived++;
    this.stats.lastActivity = new Date();
    metrics.framesReceived.inc({ packet_type: packetType });
    this.logger.debug(`<< ${packetType} serial=${packet.serialNumber} [${toHex(packet.rawFrame)}]`, TrackerSessionService.name);
    this.events.next({ type: 'packetReceived', packetType, packet });

    if (!packet.checksumValid) {
      metrics.checksumMismatches.inc();
      this.logger.warn(`Checksum mismatch on ${packetType} frame, processing anyway`, TrackerSessionService.name);
      this.events.next({ type: 'checksumMismatch', packet });
    }

    switch (packet.protocolNumber) {
      case GT06MessageType.LOGIN:
        this.onLoginAck();
        break;
      case GT06MessageType.COMMAND_INFO:
        this.onCommand(packet);
        break;
      case GT06MessageType.HEARTBEAT:
      case GT06MessageType.LOCATION:
      case GT06MessageType.LOCATION_2:
      case GT06MessageType.ALARM:
        this.logger.debug(`${packetType} acknowledged`, TrackerSessionService.name);
        break;
      default:
        this.logger.debug(`Unhandled ${packetType} frame`, TrackerSessionService.name);
    }
  }

  private onLoginAck(): void {
    if (this.state !== SessionState.CONNECTED && this.state !== SessionState.LOGGING_IN) {
      this.logger.debug(`Login acknowledgement ignored in state ${this.state}`, TrackerSessionService.name);
      return;
    }

    const config = this.config;
    if (!config) {
      return;
    }

    this.cancelTimers('login-timeout');
    this.reconnectAttempt = 0;
    this.setState(SessionState.ONLINE);
    this.logger.log(`✅ Login acknowledged, ${config.imei} is online`, TrackerSessionService.name);

    this.addInterval('heartbeat', config.heartbeatIntervalSeconds * 1000, () => this.sendHeartbeat());
    this.addInterval('location', config.locationIntervalSeconds * 1000, () =>
      this.runAsync('Location report', this.sendLocation()),
    );
    this.runAsync('Location report', this.sendLocation());
  }

  private onCommand(packet: ServerPacket): void {
    const command = interpretCommand(packet);
    this.stats.commandsReceived++;
    this.logger.log(
      `Command received: "${command.rawText}" -> ${command.kind} (serial ${command.serialNumber})`,
      TrackerSessionService.name,
    );
    this.events.next({ type: 'command', command });

    this.runAsync('Relay dispatch', this.forwardToRelay(command));
    this.write(this.encoder.buildCommandAck(command.serialNumber), 'COMMAND_ACK');
  }

  private async forwardToRelay(command: GT06Command): Promise<void> {
    const relayCommand = toRelayCommand(command);
    const success = await this.relay.send(relayCommand);
    this.events.next({ type: 'relayDispatch', command: relayCommand, success });

    if (this.tracker.replyWithCommandResponse && this.socket) {
      this.write(this.encoder.buildCommandResponse(`${relayCommand} ${success ? 'OK' : 'FAILED'}`), 'COMMAND_RESPONSE');
    }
  }

  private async currentFix(): Promise<LocationFix | null> {
    if (this.state !== SessionState.ONLINE) {
      return null;
    }

    let fix: LocationFix | null;
    try {
      fix = await this.locationSource.getCurrentPosition();
    } catch (error) {
      this.logger.warn(`Location source failed: ${toError(error).message}`, TrackerSessionService.name);
      return null;
    }

    // The session may have gone offline while waiting
    if (this.state !== SessionState.ONLINE) {
      return null;
    }

    this.gpsPositioned = isUsableFix(fix);
    if (!isUsableFix(fix)) {
      this.logger.debug('No GPS fix, location report skipped', TrackerSessionService.name);
      return null;
    }

    this.lastFix = fix;
    return fix;
  }

  private write(frame: Buffer, packetType: string): boolean {
    const socket = this.socket;
    if (!socket || socket.destroyed || !socket.writable) {
      this.logger.warn(`${packetType} not sent: no open connection`, TrackerSessionService.name);
      return false;
    }

    socket.write(frame, (error?: Error | null) => {
      if (error) {
        this.logger.error(`Write of ${packetType} failed: ${error.message}`, error.stack, TrackerSessionService.name);
      }
    });

    // Serial sits just before the check field: offset 3 + length - 2
    const serialNumber = frame.readUInt16BE(frame[2] + 1);
    const hex = toHex(frame);
    this.stats.packetsSent++;
    this.stats.lastActivity = new Date();
    metrics.framesSent.inc({ packet_type: packetType });
    this.logger.debug(`>> ${packetType} serial=${serialNumber} [${hex}]`, TrackerSessionService.name);
    this.events.next({ type: 'packetSent', packetType, serialNumber, hex });
    return true;
  }

  private setState(next: SessionState): void {
    if (next === this.state) {
      return;
    }
    const previous = this.state;
    this.state = next;
    metrics.setSessionState(ALL_STATES, next);
    this.logger.log(`Session state: ${previous} -> ${next}`, TrackerSessionService.name);
    this.events.next({ type: 'state', state: next, previous });
  }

  private timerName(kind: TimerKind): string {
    return `gt06:${this.config?.imei ?? this.defaultImei}:${kind}`;
  }

  private addInterval(kind: TimerKind, ms: number, callback: () => void): void {
    this.cancelTimers(kind);
    this.schedulerRegistry.addInterval(this.timerName(kind), setInterval(callback, ms));
  }

  private addTimeout(kind: TimerKind, ms: number, callback: () => void): void {
    this.cancelTimers(kind);
    this.schedulerRegistry.addTimeout(this.timerName(kind), setTimeout(callback, ms));
  }

  private cancelTimers(...kinds: TimerKind[]): void {
    for (const kind of kinds) {
      const name = this.timerName(kind);
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
      }
      if (this.schedulerRegistry.doesExist('timeout', name)) {
        this.schedulerRegistry.deleteTimeout(name);
      }
    }
  }

  private runAsync(label: string, task: Promise<unknown>): void {
    task.catch((error: unknown) => {
      const err = toError(error);
      this.logger.error(`${label} failed: ${err.message}`, err.stack, TrackerSessionService.name);
    });
  }
}
