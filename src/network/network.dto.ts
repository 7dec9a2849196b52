import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class CoordinateDto {
  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  lon!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;
}

export class ConnectionPairDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  from!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  to!: string;
}

export class CreateConnectionDto extends ConnectionPairDto {
  @IsOptional()
  @IsString()
  @MaxLength(40)
  transportClass?: string;
}

export class TransportClassDto extends ConnectionPairDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(40)
  transportClass!: string;
}

export class DurationOverrideDto extends ConnectionPairDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  minutes!: number;
}

export class ChainNameDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;
}
