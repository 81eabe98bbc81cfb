import { PairSnapshot } from '../types/dexscreener';
import { MessageSender } from '../types/telegram';
import { NotifyError, describeError } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';
import { Result, ok, err } from '../utils/result';
import { withTimeout } from '../utils/withTimeout';
import { logger } from '../utils/logger';

export interface Notifier {
  notify(pair: PairSnapshot): Promise<Result<void, NotifyError>>;
}

export interface AlertNotifierOptions {
  chatId: string;
  network: string;
  timeoutMs?: number;
}

export function buildAlertMessage(pair: PairSnapshot, network: string): string {
  const details = pair.url ? `[View on DEX Screener](${pair.url})` : 'N/A';

  return [
    `🚨 *New ${Formatters.capitalizeFirst(network)} Coin Alert* 🚨`,
    `Coin: ${Formatters.escapeMarkdown(pair.identifier)}`,
    `24h Volume: $${Formatters.formatUsd(pair.volume24h)}`,
    `Details: ${details}`
  ].join('\n');
}

export class AlertNotifier implements Notifier {
  private readonly sender: MessageSender;
  private readonly chatId: string;
  private readonly network: string;
  private readonly timeoutMs: number;

  constructor(sender: MessageSender, options: AlertNotifierOptions) {
    this.sender = sender;
    this.chatId = options.chatId;
    this.network = options.network;
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async notify(pair: PairSnapshot): Promise<Result<void, NotifyError>> {
    const message = buildAlertMessage(pair, this.network);

    // A timeout does not cancel the send; a late delivery still counts as failed.
    try {
      await withTimeout(
        this.sender.sendMessage(this.chatId, message, 'Markdown'),
        this.timeoutMs,
        `Alert for ${pair.identifier}`
      );
    } catch (error) {
      return err(new NotifyError(`Failed to send alert for ${pair.identifier}: ${describeError(error)}`, pair.identifier, error));
    }

    logger.info(`Alert sent for ${pair.identifier}`, { volume24h: Formatters.formatVolume(pair.volume24h) });
    return ok(undefined);
  }
}
