import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class RunReconciliationDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(5000)
  limit?: number;
}
