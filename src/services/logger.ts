import { ModerationActionRecord, PlatformGateway } from '../types';

export interface LogEvent {
  level: 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
}

export type ModerationLogger = Pick<BotLogger, 'info' | 'warn' | 'error' | 'moderation'>;

const CHANNEL_NOTIFICATION_ACTIONS = new Set(['timeout', 'kick']);

export class BotLogger {
  constructor(
    private readonly channelSender: Pick<PlatformGateway, 'sendToChannel'>,
    private readonly getLogChannelId: () => string | undefined,
  ) {}

  async info(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'info', message, meta }, false);
  }

  async warn(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'warn', message, meta }, false);
  }

  async error(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'error', message, meta }, false);
  }

  async moderation(record: ModerationActionRecord): Promise<void> {
    const shouldSendToChannel = CHANNEL_NOTIFICATION_ACTIONS.has(record.action);
    const detail = this.resolveModerationDetail(record);
    const message = [
      `[moderation] guild=${record.communityId} user=${record.accountId} action=${record.action} reason=${record.reason}`,
      detail ? `detail=${detail}` : null,
    ].filter(Boolean).join(' ');

    await this.emit(
      {
        level: 'info',
        message,
        meta: record.meta,
      },
      shouldSendToChannel,
    );
  }

  private async emit(event: LogEvent, sendToLogChannel: boolean): Promise<void> {
    const payload = {
      ts: new Date().toISOString(),
      level: event.level,
      message: event.message,
      ...(event.meta ? { meta: event.meta } : {}),
    };

    if (event.level === 'error') {
      console.error(JSON.stringify(payload));
    } else if (event.level === 'warn') {
      console.warn(JSON.stringify(payload));
    } else {
      console.log(JSON.stringify(payload));
    }

    if (!sendToLogChannel) {
      return;
    }

    const logChannelId = this.getLogChannelId();
    if (!logChannelId) return;

    const text = [
      `[#${event.level.toUpperCase()}] ${event.message}`,
      event.meta ? `meta: ${JSON.stringify(event.meta)}` : null,
    ].filter(Boolean).join('\n');

    try {
      await this.channelSender.sendToChannel(logChannelId, text);
    } catch {
      // Avoid recursive logging on send failures.
    }
  }

  private resolveModerationDetail(record: ModerationActionRecord): string | undefined {
    switch (record.action) {
      case 'timeout':
        return this.resolveTimeoutDetail(record.meta);
      case 'kick':
        return this.resolveKickDetail(record.meta);
      case 'delete_webhook':
        return this.resolveWebhookDetail(record.meta);
      default:
        return undefined;
    }
  }

  private resolveTimeoutDetail(meta: ModerationActionRecord['meta']): string {
    const timeoutHours = this.readNumber(meta, 'timeoutHours');
    if (typeof timeoutHours === 'number') {
      return `timed out for ${timeoutHours} h`;
    }

    return 'timed out';
  }

  private resolveKickDetail(meta: ModerationActionRecord['meta']): string {
    const fallbackFrom = meta?.fallbackFrom;
    if (fallbackFrom === 'timeout') {
      return 'kicked after timeout failed';
    }

    const attempts = this.readNumber(meta, 'attempts');
    if (typeof attempts === 'number') {
      return `kicked after ${attempts} attempts`;
    }

    return 'kicked';
  }

  private resolveWebhookDetail(meta: ModerationActionRecord['meta']): string {
    const webhookId = meta?.webhookId;
    return typeof webhookId === 'string' ? `webhook ${webhookId} removed` : 'webhook removed';
  }

  private readNumber(meta: ModerationActionRecord['meta'], key: string): number | undefined {
    if (!meta) {
      return undefined;
    }

    const value = meta[key];
    return typeof value === 'number' && Number.isFinite(value)
      ? value
      : undefined;
  }
}
