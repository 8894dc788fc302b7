/**
 * Language matcher
 *
 * Picks the agents a new request is broadcast to. Eligibility read here may be
 * stale by the time an agent claims; the arbiter checks it again.
 */

import { Agent, SupportRequest } from './types';
import { EntityStore } from '../store';
import { checkEligibility, speaks } from './invariants';

export class Matcher {
  constructor(private readonly store: EntityStore) {}

  /** Available, unassigned agents who speak the request's language */
  async eligibleAgents(request: SupportRequest): Promise<Agent[]> {
    const agents = await this.store.listAgents();
    return agents.filter((agent) => checkEligibility(agent, request.language) === null);
  }

  /** Open requests in the agent's languages, oldest first */
  async pendingRequestsFor(agent: Agent): Promise<SupportRequest[]> {
    const open = await this.store.listRequests('OPEN');
    return open.filter((request) => speaks(agent, request.language));
  }
}
