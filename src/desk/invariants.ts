import { v4 as uuidv4 } from 'uuid';
import { Agent, ChatMessage, IneligibleReason, SenderRole } from './types';

const LANGUAGE_CODE = /^[a-z]{2,3}(-[a-z0-9]{2,8})?$/;

export function normalizeLanguage(code: string): string {
  return code.trim().toLowerCase();
}

export function isLanguageCode(code: string): boolean {
  return LANGUAGE_CODE.test(code);
}

/**
 * Parse a comma or whitespace separated list such as "EN, es fr".
 * Valid codes come back normalized and de-duplicated in input order.
 */
export function parseLanguageList(raw: string): { valid: string[]; invalid: string[] } {
  const valid: string[] = [];
  const invalid: string[] = [];
  for (const token of raw.split(/[\s,]+/)) {
    if (!token) continue;
    const code = normalizeLanguage(token);
    if (!isLanguageCode(code)) invalid.push(token);
    else if (!valid.includes(code)) valid.push(code);
  }
  return { valid, invalid };
}

export function speaks(agent: Agent, language: string): boolean {
  return agent.languages.includes(normalizeLanguage(language));
}

/** First reason the agent cannot take a request in this language, or null. */
export function checkEligibility(agent: Agent, language: string): IneligibleReason | null {
  if (!agent.available) return 'unavailable';
  if (agent.activeAssignment !== null) return 'already_assigned';
  if (!speaks(agent, language)) return 'language_mismatch';
  return null;
}

export function newMessage(requestId: string, role: SenderRole, senderId: string, body: string): ChatMessage {
  return { id: uuidv4(), requestId, role, senderId, body, timestamp: Date.now() };
}
