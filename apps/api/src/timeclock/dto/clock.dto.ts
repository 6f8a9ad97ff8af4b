import { IsOptional, IsString, MaxLength } from "class-validator";

export class ClockDto {
  @IsOptional()
  @IsString()
  @MaxLength(500)
  note?: string;
}
