import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsInt, IsNotEmpty, IsString, Min } from 'class-validator';
import { PlatformType, ReviewRef } from '../../core/domain/entities/raw-comment.entity';

export class StartTriageDto {
  @ApiProperty({
    description: 'The platform hosting the merge/pull request',
    enum: PlatformType,
    example: 'github',
  })
  @IsEnum(PlatformType, {
    message: 'platform must be either "github" or "gitlab"',
  })
  platform!: PlatformType;

  @ApiProperty({
    description: 'The project ID (GitLab) or repo (owner/repo for GitHub)',
    example: 'owner/repo',
  })
  @IsNotEmpty()
  @IsString()
  projectId!: string;

  @ApiProperty({
    description: 'The merge/pull request number',
    example: 42,
  })
  @IsInt()
  @Min(1)
  mergeRequestId!: number;

  toReviewRef(): ReviewRef {
    return {
      platform: this.platform,
      projectId: this.projectId,
      mergeRequestId: this.mergeRequestId,
    };
  }
}
