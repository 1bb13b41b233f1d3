import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class RunRemediationDto {
  @ApiProperty({
    description: 'Maximum number of comments processed at the same time. Defaults to REMEDIATION_CONCURRENCY.',
    example: 4,
    required: false,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(32)
  concurrency?: number;
}
