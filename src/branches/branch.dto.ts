import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class SplitBranchDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  city!: string;
}

export class MergeBranchesDto {
  @IsString()
  @IsNotEmpty()
  firstBranchId!: string;

  @IsString()
  @IsNotEmpty()
  secondBranchId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  firstCity!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  secondCity!: string;
}

export class ApplyBranchDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  branchId?: string;
}
