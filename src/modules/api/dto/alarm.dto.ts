import { IsInt, Max, Min } from 'class-validator';

export class AlarmDto {
  /** GT06 alarm code, e.g. 0x01 SOS */
  @IsInt()
  @Min(0)
  @Max(0xff)
  alarmType!: number;
}
