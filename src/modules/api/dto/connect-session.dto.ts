import { IsInt, IsNotEmpty, IsOptional, IsString, Matches, Max, Min } from 'class-validator';
import { MAX_INTERVAL_SECONDS } from '../../tracker-session/tracker-session.types';

/**
 * Overrides for the configured session; omitted fields keep their configured value.
 */
export class ConnectSessionDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  serverAddress?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  serverPort?: number;

  @IsOptional()
  @Matches(/^\d{15}$/, { message: 'imei must be exactly 15 digits' })
  imei?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_INTERVAL_SECONDS)
  heartbeatIntervalSeconds?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_INTERVAL_SECONDS)
  locationIntervalSeconds?: number;
}
