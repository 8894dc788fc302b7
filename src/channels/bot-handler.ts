import pino from 'pino';
import { Desk } from '../desk';
import { LanguageCatalog } from '../config/language-catalog';
import { BotEvent, InlineKeyboard, TelegramApi } from './types';
import { copy } from './copy';
import { claimKeyboard } from './telegram-gateway';

type CommandEvent = Extract<BotEvent, { kind: 'command' }>;
type TextEvent = Extract<BotEvent, { kind: 'text' }>;
type ButtonEvent = Extract<BotEvent, { kind: 'button' }>;

/**
 * Maps each chat command, button and free-text line onto one desk operation
 * and turns the result into a reply. Notifications to the other party are the
 * desk's job; this layer only answers the sender.
 */
export class BotHandler {
  constructor(
    private readonly desk: Desk,
    private readonly api: TelegramApi,
    private readonly catalog: LanguageCatalog,
  ) {}

  async handle(event: BotEvent, log: pino.Logger): Promise<void> {
    try {
      switch (event.kind) {
        case 'command':
          await this.handleCommand(event);
          break;
        case 'text':
          await this.handleText(event);
          break;
        case 'button':
          await this.handleButton(event);
          break;
      }
    } catch (err) {
      log.error({ err, senderId: event.senderId, kind: event.kind }, 'Failed to handle update');
      await this.reply(event.senderId, copy.internalError, log);
    }
  }

  // ───── Commands ─────

  private async handleCommand(event: CommandEvent): Promise<void> {
    const { senderId } = event;
    switch (event.command) {
      case 'start':
        return this.start(event);
      case 'register_agent': {
        const { created } = await this.desk.intake.registerAgent(senderId, event.displayName);
        return this.api.sendMessage(senderId, created ? copy.registered : copy.alreadyRegistered);
      }
      case 'agent_languages':
        return this.agentLanguages(senderId, event.args);
      case 'agent_status': {
        const result = await this.desk.intake.toggleAvailability(senderId);
        if (!result.ok) return this.api.sendMessage(senderId, copy.notAnAgent);
        return this.api.sendMessage(senderId, copy.statusSet(result.agent.available, result.offered));
      }
      case 'view_requests':
        return this.viewRequests(senderId);
      case 'close_request':
        return this.closeRequest(senderId);
      default:
        return this.api.sendMessage(senderId, copy.unknownCommand);
    }
  }

  private async start(event: CommandEvent): Promise<void> {
    const agent = await this.desk.store.getAgent(event.senderId);
    if (agent) {
      return this.api.sendMessage(
        event.senderId,
        copy.agentGreeting(agent.displayName ?? event.displayName ?? 'there', agent.available),
      );
    }

    const result = await this.desk.intake.startSession(event.senderId, event.displayName);
    switch (result.kind) {
      case 'pending':
        return this.api.sendMessage(event.senderId, copy.stillPending);
      case 'in_conversation':
        return this.api.sendMessage(event.senderId, copy.alreadyConnected);
      case 'choose_language': {
        const keyboard: InlineKeyboard = result.languages.map((l) => [{ text: l.label, callback_data: `lang:${l.code}` }]);
        return this.api.sendMessage(event.senderId, copy.welcome, keyboard);
      }
    }
  }

  private async agentLanguages(senderId: string, args: string): Promise<void> {
    if (!args) return this.languagesUsage(senderId);

    const result = await this.desk.intake.setAgentLanguages(senderId, args);
    if (result.ok) return this.api.sendMessage(senderId, copy.languagesSet(result.agent.languages));
    if (result.error === 'NotFound') return this.api.sendMessage(senderId, copy.notAnAgent);
    // "/agent_languages ,," names no code at all
    if (result.invalid.length === 0) return this.languagesUsage(senderId);
    return this.api.sendMessage(senderId, copy.invalidLanguages(result.invalid));
  }

  private async languagesUsage(senderId: string): Promise<void> {
    const agent = await this.desk.store.getAgent(senderId);
    if (!agent) return this.api.sendMessage(senderId, copy.notAnAgent);
    return this.api.sendMessage(senderId, copy.languagesUsage(agent.languages));
  }

  private async viewRequests(senderId: string): Promise<void> {
    const result = await this.desk.intake.listAgentRequests(senderId);
    if (!result.ok) return this.api.sendMessage(senderId, copy.notAnAgent);

    const assigned = result.assigned ? copy.assignedLine(result.assigned) : copy.none;
    await this.api.sendMessage(senderId, `${copy.assignedHeader}\n${assigned}`);

    if (result.pending.length === 0) {
      return this.api.sendMessage(senderId, `${copy.pendingHeader}\n${copy.none}`);
    }
    for (const request of result.pending) {
      await this.api.sendMessage(senderId, copy.pendingRequest(request), claimKeyboard(request));
    }
  }

  private async closeRequest(senderId: string): Promise<void> {
    const isAgent = (await this.desk.store.getAgent(senderId)) !== null;
    const result = await this.desk.router.closeActiveFor(isAgent ? 'agent' : 'customer', senderId);
    if (!result.ok) return this.api.sendMessage(senderId, copy.noActiveConversation);
    if (result.alreadyClosed) return this.api.sendMessage(senderId, copy.alreadyClosed);
  }

  // ───── Free text ─────

  private async handleText(event: TextEvent): Promise<void> {
    const { senderId, text } = event;

    if (await this.desk.store.getAgent(senderId)) {
      const routed = await this.desk.router.routeAgentMessage(senderId, text);
      if (!routed.ok) return this.api.sendMessage(senderId, copy.notAssigned);
      return;
    }

    const routed = await this.desk.router.routeCustomerMessage(senderId, text);
    if (routed.ok) return;

    const opened = await this.desk.intake.openRequest(senderId, text);
    if (opened.ok) {
      return this.api.sendMessage(senderId, opened.created ? copy.lookingForAgent : copy.stillPending);
    }
    switch (opened.error) {
      case 'ActiveRequestExists':
        return this.api.sendMessage(senderId, copy.agentJustJoined);
      case 'NotFound':
      case 'LanguageNotSelected':
        return this.api.sendMessage(senderId, copy.useStart);
    }
  }

  // ───── Buttons ─────

  private async handleButton(event: ButtonEvent): Promise<void> {
    const [action, value = ''] = splitOnce(event.data, ':');
    switch (action) {
      case 'lang':
        return this.selectLanguage(event, value);
      case 'claim': {
        const result = await this.desk.arbiter.attemptClaim(value, event.senderId);
        return this.api.answerCallbackQuery(event.callbackQueryId, copy.claimAnswer(result.ok));
      }
      default:
        return this.api.answerCallbackQuery(event.callbackQueryId, copy.unknownCommand);
    }
  }

  private async selectLanguage(event: ButtonEvent, code: string): Promise<void> {
    await this.api.answerCallbackQuery(event.callbackQueryId);
    const result = await this.desk.intake.selectLanguage(event.senderId, code);
    if (result.ok) {
      return this.api.sendMessage(event.senderId, copy.describeIssue(this.catalog.label(code)));
    }
    switch (result.error) {
      case 'InvalidLanguage':
        return this.api.sendMessage(event.senderId, copy.unknownLanguage);
      case 'NotFound':
        return this.api.sendMessage(event.senderId, copy.useStart);
      case 'ActiveRequestExists':
        return this.api.sendMessage(event.senderId, copy.requestAlreadyOpen);
    }
  }

  private async reply(chatId: string, text: string, log: pino.Logger): Promise<void> {
    try {
      await this.api.sendMessage(chatId, text);
    } catch (err) {
      log.warn({ err, chatId }, 'Failed to send error reply');
    }
  }
}

function splitOnce(value: string, separator: string): [string, string?] {
  const idx = value.indexOf(separator);
  return idx === -1 ? [value] : [value.slice(0, idx), value.slice(idx + 1)];
}
