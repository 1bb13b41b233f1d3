import { Injectable } from '@nestjs/common';
import { PlatformType } from '../../core/domain/entities/raw-comment.entity';
import {
  PlatformGateway,
  PlatformGatewayRegistry,
} from '../../core/domain/repositories/platform-gateway.repository';
import { GithubPlatformGateway } from '../github/github-platform.gateway';
import { GitlabPlatformGateway } from '../gitlab/gitlab-platform.gateway';

@Injectable()
export class PlatformGatewayFactory implements PlatformGatewayRegistry {
  constructor(
    private readonly githubGateway: GithubPlatformGateway,
    private readonly gitlabGateway: GitlabPlatformGateway,
  ) {}

  /**
   * Get the gateway for the platform a review lives on
   */
  forPlatform(platform: PlatformType): PlatformGateway {
    switch (platform) {
      case PlatformType.GITHUB:
        return this.githubGateway;
      case PlatformType.GITLAB:
        return this.gitlabGateway;
    }
  }
}
