import { ChatMessage, ClaimRejection, IneligibleReason, SupportRequest } from '../desk/types';

/** Short form of a request id for chat text */
export function shortId(requestId: string): string {
  return requestId.slice(0, 8);
}

const INELIGIBLE_TEXT: Record<IneligibleReason, string> = {
  unavailable: 'You are marked unavailable. Use /agent_status to become available first.',
  already_assigned: 'You already have an active conversation. Close it with /close_request first.',
  language_mismatch: 'This request is in a language outside your proficiencies. Use /agent_languages to update them.',
};

export const copy = {
  welcome: 'Welcome to Support! Please select your preferred language:',
  describeIssue: (languageLabel: string) => `You've selected ${languageLabel}. Please describe your issue.`,
  useStart: 'Please use /start to begin a new support request and select your language.',
  stillPending: 'Your request is still pending. Please wait for an agent to claim it.',
  alreadyConnected: 'You are already connected with an agent. Just type your message, or /close_request to end the conversation.',
  agentJustJoined: 'An agent has just joined your conversation. Please send your message again.',
  lookingForAgent: 'Thank you. We are looking for an available agent to assist you.',
  unknownLanguage: 'That language is not supported. Please use /start and pick one from the list.',
  requestAlreadyOpen: 'You already have an open request. Please wait for an agent.',
  noAgentsAvailable:
    'No agents are currently available for your language. Your request stays open and an agent will pick it up as soon as one is free.',

  agentGreeting: (name: string, available: boolean) =>
    `Hello Agent ${name}! You are currently ${available ? 'available' : 'unavailable'}. ` +
    'Use /agent_status to change your availability, /agent_languages to manage your languages, or /view_requests to see pending requests.',
  registered:
    'You are now registered as a support agent! Use /agent_languages to set your language proficiencies (e.g. /agent_languages en,es) and /agent_status to toggle your availability.',
  alreadyRegistered: 'You are already registered as an agent.',
  notAnAgent: 'You are not registered as an agent. Use /register_agent first.',
  languagesUsage: (current: string[]) =>
    `Usage: /agent_languages <lang1,lang2,...>\nYour current languages: ${current.length > 0 ? current.join(', ') : 'None'}`,
  invalidLanguages: (invalid: string[]) => `Unrecognized language codes: ${invalid.join(', ')}`,
  languagesSet: (languages: string[]) => `Your language proficiencies have been set to: ${languages.join(', ')}`,
  statusSet: (available: boolean, offered: number) =>
    `Your status has been set to: ${available ? 'available' : 'unavailable'}` +
    (offered > 0 ? `\n${offered} pending request(s) are waiting for you.` : ''),
  notAssigned: 'You are not currently assigned to any active support request. Use /view_requests.',
  noActiveConversation: 'You have no active conversation to close.',
  alreadyClosed: 'This request has already been closed.',
  unknownCommand: 'Unknown command.',
  internalError: 'An internal error occurred. Please try again later.',

  assignedHeader: 'Your Assigned Request:',
  pendingHeader: 'Pending Requests (you can claim):',
  none: 'None.',
  assignedLine: (request: SupportRequest) =>
    `- #${shortId(request.id)}, Lang: ${request.language.toUpperCase()}, since ${new Date(request.assignedAt ?? request.createdAt).toISOString()}`,
  claimButton: 'Claim this request',

  newRequest: (request: SupportRequest) =>
    `🚨 New Support Request #${shortId(request.id)} 🚨\n\n` +
    `Language: ${request.language.toUpperCase()}\n` +
    `Initial Query: "${truncate(request.initialQuery, 100)}"`,
  pendingRequest: (request: SupportRequest) =>
    `🚨 Pending Request #${shortId(request.id)} 🚨\n` +
    `Language: ${request.language.toUpperCase()}\n` +
    `Time: ${new Date(request.createdAt).toISOString()}`,

  claimed: (request: SupportRequest) => `You have successfully claimed Request #${shortId(request.id)}!`,
  history: (request: SupportRequest, history: ChatMessage[]) =>
    `Conversation history for Request #${shortId(request.id)}:\n` +
    history.map((m) => `${m.role === 'customer' ? 'Customer' : 'Agent'}: ${m.body}`).join('\n'),
  agentJoined: (agentName: string) =>
    `Good news! An agent (${agentName}) has joined your chat. They will be with you shortly.`,
  claimLost: (requestId: string) => `Request #${shortId(requestId)} is no longer available.`,
  claimRejected: (rejection: ClaimRejection): string => {
    switch (rejection.error) {
      case 'AlreadyClaimed':
        return 'This request has already been claimed by another agent.';
      case 'NotFound':
        return rejection.entity === 'agent'
          ? 'You are not registered as an agent. Use /register_agent first.'
          : 'This support request no longer exists.';
      case 'AgentIneligible':
        return INELIGIBLE_TEXT[rejection.reason];
    }
  },
  claimAnswer: (ok: boolean) => (ok ? 'Claimed!' : 'No longer available'),

  fromAgent: (text: string) => `From Agent:\n${text}`,
  fromCustomer: (text: string) => `From Customer:\n${text}`,
  closedForUser: 'Your support request has been closed. If you need further assistance, please start a new request with /start.',
  closedForAgent: (request: SupportRequest) => `Request #${shortId(request.id)} has been closed.`,
};

/** Cuts on code points so an emoji is never split in half. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}
