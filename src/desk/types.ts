/**
 * Support desk domain types.
 */

export type RequestStatus = 'OPEN' | 'ASSIGNED' | 'CLOSED';

export type SenderRole = 'customer' | 'agent';

export type CloseInitiator = SenderRole | 'admin';

export interface User {
  /** Stable chat identity */
  id: string;
  displayName?: string;
  /** Language chosen at session start; copied onto the next request */
  language: string | null;
  /** The user's single non-closed request, if any */
  activeRequestId: string | null;
  createdAt: number;
}

export interface Agent {
  id: string;
  displayName?: string;
  /** Normalized lowercase language codes */
  languages: string[];
  available: boolean;
  activeAssignment: string | null;
  createdAt: number;
}

export interface SupportRequest {
  id: string;
  userId: string;
  language: string;
  initialQuery: string;
  status: RequestStatus;
  /** Write-once; kept after close for history */
  assignedAgentId: string | null;
  createdAt: number;
  assignedAt: number | null;
  closedAt: number | null;
  closedBy: CloseInitiator | null;
}

export interface ChatMessage {
  id: string;
  requestId: string;
  role: SenderRole;
  senderId: string;
  body: string;
  timestamp: number;
}

// ───── Results ─────

export type IneligibleReason = 'unavailable' | 'already_assigned' | 'language_mismatch';

export type ClaimRejection =
  | { error: 'AlreadyClaimed' }
  | { error: 'NotFound'; entity: 'request' | 'agent' }
  | { error: 'AgentIneligible'; reason: IneligibleReason };

export type ClaimResult =
  | { ok: true; request: SupportRequest; agent: Agent }
  | ({ ok: false } & ClaimRejection);

export type RouteResult =
  | { ok: true; message: ChatMessage; request: SupportRequest }
  | { ok: false; error: 'NoActiveAssignment' | 'NotFound' };

export type CloseResult =
  | { ok: true; request: SupportRequest; alreadyClosed: boolean }
  | { ok: false; error: 'NoActiveAssignment' | 'NotFound' };

// ───── Notification Gateway ─────

/**
 * Outbound delivery to chat participants. Every call is best-effort: the desk
 * invokes it after a commit and never awaits the outcome.
 */
export interface NotificationGateway {
  broadcastNewRequest(request: SupportRequest, agents: Agent[]): Promise<void>;
  notifyAssigned(request: SupportRequest, winningAgent: Agent, history: ChatMessage[]): Promise<void>;
  notifyClaimLost(agentId: string, requestId: string): Promise<void>;
  notifyClaimRejected(agentId: string, rejection: ClaimRejection): Promise<void>;
  deliverToUser(userId: string, text: string): Promise<void>;
  deliverToAgent(agentId: string, text: string): Promise<void>;
  notifyClosed(request: SupportRequest): Promise<void>;
  notifyNoAgentsAvailable(request: SupportRequest): Promise<void>;
}
