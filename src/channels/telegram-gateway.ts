import { Agent, ChatMessage, ClaimRejection, NotificationGateway, SupportRequest } from '../desk/types';
import { InlineKeyboard, TelegramApi } from './types';
import { copy } from './copy';
import { logger } from '../observability/logger';

type Delivery = [chatId: string, send: () => Promise<void>];

export function claimKeyboard(request: SupportRequest): InlineKeyboard {
  return [[{ text: copy.claimButton, callback_data: `claim:${request.id}` }]];
}

/**
 * Notification Gateway over the Telegram Bot API. Chat ids are the
 * participants' stable ids, since the desk only serves private chats.
 */
export class TelegramNotificationGateway implements NotificationGateway {
  private readonly log = logger.child({ component: 'telegram-gateway' });

  constructor(private readonly api: TelegramApi) {}

  async broadcastNewRequest(request: SupportRequest, agents: Agent[]): Promise<void> {
    const text = copy.newRequest(request);
    const keyboard = claimKeyboard(request);
    await this.sendEach(
      `Broadcast of ${request.id}`,
      request.id,
      agents.map((agent): Delivery => [agent.id, () => this.api.sendMessage(agent.id, text, keyboard)]),
    );
  }

  async notifyAssigned(request: SupportRequest, winningAgent: Agent, history: ChatMessage[]): Promise<void> {
    await this.sendEach(`Assignment notice for ${request.id}`, request.id, [
      [
        winningAgent.id,
        async () => {
          await this.api.sendMessage(winningAgent.id, copy.claimed(request));
          if (history.length > 0) {
            await this.api.sendMessage(winningAgent.id, copy.history(request, history));
          }
        },
      ],
      [
        request.userId,
        () => this.api.sendMessage(request.userId, copy.agentJoined(winningAgent.displayName ?? 'Support')),
      ],
    ]);
  }

  async notifyClaimLost(agentId: string, requestId: string): Promise<void> {
    await this.api.sendMessage(agentId, copy.claimLost(requestId));
  }

  async notifyClaimRejected(agentId: string, rejection: ClaimRejection): Promise<void> {
    await this.api.sendMessage(agentId, copy.claimRejected(rejection));
  }

  async deliverToUser(userId: string, text: string): Promise<void> {
    await this.api.sendMessage(userId, copy.fromAgent(text));
  }

  async deliverToAgent(agentId: string, text: string): Promise<void> {
    await this.api.sendMessage(agentId, copy.fromCustomer(text));
  }

  async notifyClosed(request: SupportRequest): Promise<void> {
    const deliveries: Delivery[] = [[request.userId, () => this.api.sendMessage(request.userId, copy.closedForUser)]];
    const agentId = request.assignedAgentId;
    if (agentId) {
      deliveries.push([agentId, () => this.api.sendMessage(agentId, copy.closedForAgent(request))]);
    }
    await this.sendEach(`Close notice for ${request.id}`, request.id, deliveries);
  }

  async notifyNoAgentsAvailable(request: SupportRequest): Promise<void> {
    await this.api.sendMessage(request.userId, copy.noAgentsAvailable);
  }

  /** Every recipient gets its send even when another chat rejects. */
  private async sendEach(what: string, requestId: string, deliveries: Delivery[]): Promise<void> {
    const results = await Promise.allSettled(deliveries.map(([, send]) => send()));

    let failed = 0;
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        failed++;
        this.log.warn({ err: result.reason, chatId: deliveries[i][0], requestId }, 'Failed to notify chat');
      }
    });
    if (failed > 0) {
      throw new Error(`${what} failed for ${failed} of ${deliveries.length} chats`);
    }
  }
}
