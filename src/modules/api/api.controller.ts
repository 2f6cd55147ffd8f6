import { Body, Controller, Get, Header, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiService } from './api.service';
import { AlarmDto } from './dto/alarm.dto';
import { ConnectSessionDto } from './dto/connect-session.dto';
import { PushLocationDto } from './dto/push-location.dto';
import { RelayCommandDto } from './dto/relay-command.dto';
import { BearerAuthGuard } from './guard/bearer-auth.guard';

@Controller('api')
export class ApiController {
  constructor(private readonly apiService: ApiService) {}

  @Get('health')
  getHealth() {
    return this.apiService.getHealthStatus();
  }

  @Get('info')
  getInfo() {
    return this.apiService.getSystemInfo();
  }

  @Get('status')
  getStatus() {
    return this.apiService.getStatus();
  }

  @Get('metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  getMetrics() {
    return this.apiService.getMetrics();
  }

  @Post('session/connect')
  @HttpCode(202)
  @UseGuards(BearerAuthGuard)
  connect(@Body() dto: ConnectSessionDto) {
    return this.apiService.connect(dto);
  }

  @Post('session/disconnect')
  @HttpCode(200)
  @UseGuards(BearerAuthGuard)
  disconnect() {
    return this.apiService.disconnect();
  }

  @Post('location')
  @HttpCode(202)
  @UseGuards(BearerAuthGuard)
  pushLocation(@Body() dto: PushLocationDto) {
    return this.apiService.pushLocation(dto);
  }

  @Post('alarm')
  @HttpCode(200)
  @UseGuards(BearerAuthGuard)
  raiseAlarm(@Body() dto: AlarmDto) {
    return this.apiService.raiseAlarm(dto);
  }

  @Post('relay')
  @HttpCode(200)
  @UseGuards(BearerAuthGuard)
  sendRelayCommand(@Body() dto: RelayCommandDto) {
    return this.apiService.sendRelayCommand(dto);
  }
}
