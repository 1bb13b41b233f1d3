import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { lastValueFrom } from 'rxjs';
import { AxiosResponse, isAxiosError } from 'axios';
import { ReviewComment } from '../../core/domain/entities/review-comment.entity';
import {
  RemediationAction,
  RemediationContext,
  RemediationResult,
} from '../../core/domain/repositories/remediation-action.repository';
import { describeError } from '../../core/domain/errors/triage.errors';

interface RemediationResponse {
  success?: boolean;
  changeRef?: string;
  reason?: string;
}

export const DEFAULT_REMEDIATION_TIMEOUT_MS = 300000;

/**
 * Hands an auto-fix comment to an external fixer over HTTP.
 * The fixer only ever sees the sanitised body.
 */
@Injectable()
export class HttpRemediationAction implements RemediationAction {
  private readonly logger = new Logger(HttpRemediationAction.name);
  private readonly url: string;
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.url = this.configService.get<string>('REMEDIATION_URL', '');
    this.token = this.configService.get<string>('REMEDIATION_TOKEN', '');
    this.timeoutMs =
      Number(this.configService.get<string | number>('REMEDIATION_TIMEOUT_MS', DEFAULT_REMEDIATION_TIMEOUT_MS)) ||
      DEFAULT_REMEDIATION_TIMEOUT_MS;
  }

  async attemptFix(comment: ReviewComment, context: RemediationContext): Promise<RemediationResult> {
    if (!this.url) {
      return { ok: false, reason: 'Remediation endpoint is not configured' };
    }

    try {
      const response: AxiosResponse<RemediationResponse> = await lastValueFrom(
        this.httpService.post<RemediationResponse>(
          this.url,
          {
            reviewRef: context.reviewRef,
            comment: {
              id: comment.id,
              author: comment.author,
              body: comment.sanitized.content,
              location: comment.location,
              category: comment.category,
              severity: comment.severity,
              note: comment.note,
              redFlags: comment.sanitized.redFlags,
            },
          },
          {
            headers: {
              ...(this.token ? { Authorization: `Bearer ${this.token}` } : {}),
              'Content-Type': 'application/json',
            },
            timeout: this.timeoutMs,
            signal: context.signal,
          },
        ),
      );

      return this.toResult(response.data);
    } catch (error) {
      const reason =
        isAxiosError(error) && error.response
          ? `Remediation endpoint answered ${error.response.status}`
          : describeError(error);
      this.logger.warn(`Remediation request for comment ${comment.id} failed: ${reason}`);
      return { ok: false, reason };
    }
  }

  private toResult(data: RemediationResponse | null | undefined): RemediationResult {
    if (data?.success === true && typeof data.changeRef === 'string' && data.changeRef.length > 0) {
      return { ok: true, changeRef: data.changeRef };
    }
    if (data?.success === true) {
      return { ok: false, reason: 'Remediation endpoint reported success without a change reference' };
    }
    return { ok: false, reason: typeof data?.reason === 'string' && data.reason ? data.reason : 'Remediation failed' };
  }
}
