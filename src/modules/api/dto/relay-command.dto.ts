import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RelayCommandDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  command!: string;
}
