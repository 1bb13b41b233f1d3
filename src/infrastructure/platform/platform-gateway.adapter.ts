import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosRequestConfig, isAxiosError } from 'axios';
import { lastValueFrom } from 'rxjs';
import { StatusKind } from '../../core/domain/entities/comment-batch.entity';
import { RawComment, ReviewRef } from '../../core/domain/entities/raw-comment.entity';
import { PlatformGateway, PostStatusOptions } from '../../core/domain/repositories/platform-gateway.repository';
import { describeError } from '../../core/domain/errors/triage.errors';

export const DEFAULT_PLATFORM_TIMEOUT_MS = 30000;

/**
 * Hidden marker placed on every status the service posts, so a later fetch can skip them
 */
export const STATUS_MARKER = '<!-- comment-triage:status -->';

const STATUS_TITLES: Record<StatusKind, string> = {
  [StatusKind.ACKNOWLEDGEMENT]: 'On it',
  [StatusKind.COMPLETION]: 'Fixed',
  [StatusKind.FAILURE]: 'Automated fix failed',
  [StatusKind.WONT_FIX_RATIONALE]: "Won't fix",
};

// Conventional Comments prefix, e.g. "issue (blocking, security): ..." or "**nitpick**: ..."
const CONVENTIONAL_PREFIX = /^\s*\**([a-z][a-z-]*)\**\s*(?:\(([^)]*)\))?\s*\**\s*:/i;
const SUGGESTION_FENCE = /```suggestion\b/;

/**
 * Base class for platform gateways: configuration, HTTP helpers and the
 * attribute extraction shared by every provider.
 */
export abstract class PlatformGatewayAdapter implements PlatformGateway {
  protected readonly apiBaseUrl: string;
  protected readonly apiToken: string;

  constructor(
    protected readonly configService: ConfigService,
    protected readonly httpService: HttpService,
    baseUrlConfigKey: string,
    tokenConfigKey: string,
    defaultBaseUrl: string,
  ) {
    this.apiBaseUrl = this.configService.get<string>(baseUrlConfigKey, defaultBaseUrl).replace(/\/+$/, '');
    this.apiToken = this.configService.get<string>(tokenConfigKey, '');
  }

  abstract fetchComments(reviewRef: ReviewRef): Promise<RawComment[]>;
  abstract postStatus(
    reviewRef: ReviewRef,
    commentId: string,
    kind: StatusKind,
    message: string,
    options?: PostStatusOptions,
  ): Promise<void>;

  protected abstract getAuthHeaders(): Record<string, string>;

  protected async apiGet<T>(endpoint: string, config: AxiosRequestConfig = {}): Promise<T> {
    const response = await lastValueFrom(
      this.httpService.get<T>(`${this.apiBaseUrl}/${endpoint}`, {
        ...config,
        headers: { ...this.getAuthHeaders(), ...config.headers },
      }),
    );
    return response.data;
  }

  protected async apiPost<T>(endpoint: string, body: unknown, signal?: AbortSignal): Promise<T> {
    const response = await lastValueFrom(
      this.httpService.post<T>(`${this.apiBaseUrl}/${endpoint}`, body, {
        headers: { ...this.getAuthHeaders(), 'Content-Type': 'application/json' },
        ...(signal ? { signal } : {}),
      }),
    );
    return response.data;
  }

  protected formatStatus(kind: StatusKind, message: string): string {
    return `${STATUS_MARKER}\n**${STATUS_TITLES[kind]}**\n\n${message}`;
  }

  protected isStatusComment(body: string | null | undefined): boolean {
    return !!body && body.includes(STATUS_MARKER);
  }

  /**
   * Structured signals read from the comment markup. No interpretation of prose.
   */
  protected extractAttributes(body: string): Pick<RawComment, 'labels' | 'hasSuggestion' | 'isQuestion'> {
    return {
      labels: this.extractLabels(body),
      hasSuggestion: SUGGESTION_FENCE.test(body),
      isQuestion: body.trim().endsWith('?'),
    };
  }

  protected extractLabels(body: string): string[] {
    const match = body.match(CONVENTIONAL_PREFIX);
    if (!match) {
      return [];
    }
    const decorations = (match[2] ?? '')
      .split(',')
      .map((decoration) => decoration.trim())
      .filter((decoration) => decoration.length > 0);
    return [match[1], ...decorations].map((label) => label.toLowerCase());
  }

  protected describeHttpError(error: unknown): string {
    if (isAxiosError(error) && error.response) {
      return `${error.response.status} ${error.response.statusText}`.trim();
    }
    return describeError(error);
  }
}
