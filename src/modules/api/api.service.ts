import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { metrics } from '../../utils/metrics';
import { LocationService } from '../location/location.service';
import { LocationFix } from '../location/location.types';
import { ExtendedLoggerService } from '../logger/logger.interface';
import { InvalidConfigError, InvalidImeiError } from '../protocols/gt06/gt06.errors';
import { GT06AlarmType } from '../protocols/gt06/gt06.types';
import { RelayDispatcherService } from '../relay/relay-dispatcher.service';
import { TrackerSessionService } from '../tracker-session/tracker-session.service';
import { SessionState, SessionStats } from '../tracker-session/tracker-session.types';
import { AlarmDto } from './dto/alarm.dto';
import { ConnectSessionDto } from './dto/connect-session.dto';
import { PushLocationDto } from './dto/push-location.dto';
import { RelayCommandDto } from './dto/relay-command.dto';

export interface SessionStatus {
  state: SessionState;
  imei: string;
  server: string | null;
  stats: SessionStats;
  relay: { transport: string; connected: boolean; commandsSent: number };
  lastFix: LocationFix | null;
}

@Injectable()
export class ApiService {
  constructor(
    @Inject(WINSTON_MODULE_NEST_PROVIDER)
    private readonly logger: ExtendedLoggerService,
    private readonly session: TrackerSessionService,
    private readonly location: LocationService,
    private readonly relay: RelayDispatcherService,
  ) {}

  getHealthStatus() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  getSystemInfo() {
    return {
      name: 'GT06 Tracker Gateway',
      version: '1.0.0',
      environment: process.env.NODE_ENV || 'development',
      nodeVersion: process.version,
      platform: process.platform,
      pid: process.pid,
    };
  }

  getStatus(): SessionStatus {
    const config = this.session.getConfig();
    return {
      state: this.session.getState(),
      imei: this.session.imei,
      server: config ? `${config.serverAddress}:${config.serverPort}` : null,
      stats: this.session.getStats(),
      relay: {
        transport: this.relay.transportName,
        connected: this.relay.isConnected(),
        commandsSent: this.relay.sentCount,
      },
      lastFix: this.session.getLastFix() ?? this.location.getLatest(),
    };
  }

  getMetrics(): Promise<string> {
    return metrics.getMetrics();
  }

  async connect(dto: ConnectSessionDto): Promise<{ state: SessionState }> {
    try {
      await this.session.connect(this.session.resolveConfig(dto));
    } catch (error) {
      if (error instanceof InvalidConfigError || error instanceof InvalidImeiError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
    return { state: this.session.getState() };
  }

  disconnect(): { state: SessionState } {
    this.session.disconnect();
    this.logger.log('Session disconnected via API', ApiService.name);
    return { state: this.session.getState() };
  }

  pushLocation(dto: PushLocationDto): { accepted: boolean } {
    this.location.update({
      latitude: dto.latitude,
      longitude: dto.longitude,
      speedKmh: dto.speedKmh ?? 0,
      headingDeg: dto.headingDeg ?? 0,
      accuracy: dto.accuracy ?? 0,
      timestamp: dto.timestamp ? new Date(dto.timestamp) : new Date(),
      isValid: dto.isValid ?? true,
      satellites: dto.satellites,
    });
    return { accepted: true };
  }

  async raiseAlarm(dto: AlarmDto): Promise<{ sent: boolean; alarm: string }> {
    const sent = await this.session.sendAlarm(dto.alarmType);
    return { sent, alarm: GT06AlarmType[dto.alarmType] ?? 'UNKNOWN' };
  }

  async sendRelayCommand(dto: RelayCommandDto): Promise<{ sent: boolean; command: string }> {
    const sent = await this.relay.send(dto.command);
    return { sent, command: dto.command.trim() };
  }
}
