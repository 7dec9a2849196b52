import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export class DocumentNameDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  @Matches(/^[\w.-]+$/)
  name?: string;
}
