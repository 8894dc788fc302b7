import {
  createDeskFixture,
  DeskFixture,
  makeAgent,
  seedAgents,
  seedOpenRequest,
} from '../helpers/desk-fixtures';

describe('ConversationRouter', () => {
  let fx: DeskFixture;

  /** u1 in conversation with agent A over R1 */
  async function seedConversation(): Promise<void> {
    await seedOpenRequest(fx.store, 'R1', 'u1');
    await seedAgents(fx.store, makeAgent('A'), makeAgent('B'));
    const claim = await fx.desk.arbiter.attemptClaim('R1', 'A');
    if (!claim.ok) throw new Error('claim failed');
  }

  beforeEach(() => {
    fx = createDeskFixture();
  });

  describe('routeCustomerMessage', () => {
    it('should relay to the assigned agent exactly once and log the message', async () => {
      await seedConversation();

      const result = await fx.desk.router.routeCustomerMessage('u1', 'Any update?');

      expect(result.ok).toBe(true);
      expect(fx.gateway.deliverToAgent.mock.calls).toEqual([['A', 'Any update?']]);
      expect(fx.gateway.deliverToUser).not.toHaveBeenCalled();
      const log = await fx.store.listMessages('R1');
      expect(log.map((m) => [m.role, m.senderId, m.body])).toEqual([['customer', 'u1', 'Any update?']]);
    });

    it('should refuse while the request is still open', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      const result = await fx.desk.router.routeCustomerMessage('u1', 'hello?');
      expect(result).toEqual({ ok: false, error: 'NoActiveAssignment' });
      expect(fx.gateway.deliverToAgent).not.toHaveBeenCalled();
      expect(await fx.store.listMessages('R1')).toEqual([]);
    });

    it('should report an unknown customer', async () => {
      expect(await fx.desk.router.routeCustomerMessage('ghost', 'hi')).toEqual({ ok: false, error: 'NotFound' });
    });
  });

  describe('routeAgentMessage', () => {
    it('should relay to the customer exactly once', async () => {
      await seedConversation();

      const result = await fx.desk.router.routeAgentMessage('A', 'Checking now.');

      expect(result.ok).toBe(true);
      expect(fx.gateway.deliverToUser.mock.calls).toEqual([['u1', 'Checking now.']]);
      const log = await fx.store.listMessages('R1');
      expect(log.map((m) => m.role)).toEqual(['agent']);
    });

    it('should refuse an agent without an assignment', async () => {
      await seedConversation();
      expect(await fx.desk.router.routeAgentMessage('B', 'hi')).toEqual({ ok: false, error: 'NoActiveAssignment' });
      expect(fx.gateway.deliverToUser).not.toHaveBeenCalled();
    });
  });

  describe('closeRequest', () => {
    it('should close an assigned request and free both parties', async () => {
      await seedConversation();

      const result = await fx.desk.router.closeRequest('R1', 'agent');

      expect(result).toMatchObject({ ok: true, alreadyClosed: false });
      expect(await fx.store.getRequest('R1')).toMatchObject({
        status: 'CLOSED',
        closedBy: 'agent',
        assignedAgentId: 'A',
      });
      expect((await fx.store.getAgent('A'))?.activeAssignment).toBeNull();
      expect(await fx.store.getUser('u1')).toMatchObject({ activeRequestId: null, language: null });
      expect(fx.gateway.notifyClosed).toHaveBeenCalledTimes(1);
    });

    it('should be idempotent', async () => {
      await seedConversation();
      await fx.desk.router.closeRequest('R1', 'customer');
      const closed = await fx.store.getRequest('R1');

      const again = await fx.desk.router.closeRequest('R1', 'agent');

      expect(again).toMatchObject({ ok: true, alreadyClosed: true });
      expect(await fx.store.getRequest('R1')).toEqual(closed);
      expect(fx.gateway.notifyClosed).toHaveBeenCalledTimes(1);
    });

    it('should close once under concurrent close calls', async () => {
      await seedConversation();

      const results = await Promise.all([
        fx.desk.router.closeRequest('R1', 'agent'),
        fx.desk.router.closeRequest('R1', 'customer'),
      ]);

      expect(results.filter((r) => r.ok && !r.alreadyClosed)).toHaveLength(1);
      expect(results.filter((r) => r.ok && r.alreadyClosed)).toHaveLength(1);
      expect(fx.gateway.notifyClosed).toHaveBeenCalledTimes(1);
    });

    it('should stop relaying after close', async () => {
      await seedConversation();
      await fx.desk.router.closeRequest('R1', 'agent');

      expect(await fx.desk.router.routeCustomerMessage('u1', 'hello?')).toEqual({
        ok: false,
        error: 'NoActiveAssignment',
      });
      expect(await fx.desk.router.routeAgentMessage('A', 'hello?')).toEqual({ ok: false, error: 'NoActiveAssignment' });
    });

    it('should let the agent claim again after close', async () => {
      await seedConversation();
      await fx.desk.router.closeRequest('R1', 'agent');
      await seedOpenRequest(fx.store, 'R2', 'u2');

      const claim = await fx.desk.arbiter.attemptClaim('R2', 'A');
      expect(claim.ok).toBe(true);
    });

    it('should refuse a non-admin close of an open request', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      const result = await fx.desk.router.closeRequest('R1', 'customer');
      expect(result).toEqual({ ok: false, error: 'NoActiveAssignment' });
      expect((await fx.store.getRequest('R1'))?.status).toBe('OPEN');
    });

    it('should let an admin cancel an open request and withdraw it from every recipient', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      await fx.store.recordBroadcast('R1', ['A', 'B']);

      const result = await fx.desk.router.closeRequest('R1', 'admin');

      expect(result).toMatchObject({ ok: true, alreadyClosed: false });
      expect(await fx.store.getRequest('R1')).toMatchObject({ status: 'CLOSED', closedBy: 'admin', assignedAgentId: null });
      expect((await fx.store.getUser('u1'))?.activeRequestId).toBeNull();
      expect(fx.gateway.notifyClosed).toHaveBeenCalledTimes(1);
      expect(fx.gateway.notifyClaimLost.mock.calls).toEqual([
        ['A', 'R1'],
        ['B', 'R1'],
      ]);
    });

    it('should report an unknown request', async () => {
      expect(await fx.desk.router.closeRequest('nope', 'admin')).toEqual({ ok: false, error: 'NotFound' });
    });

    it('should close an assignment that landed while an admin cancel was waiting', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      await seedAgents(fx.store, makeAgent('A'));

      const [claim, cancel] = await Promise.all([
        fx.desk.arbiter.attemptClaim('R1', 'A'),
        fx.desk.router.closeRequest('R1', 'admin'),
      ]);

      expect(cancel.ok).toBe(true);
      expect((await fx.store.getRequest('R1'))?.status).toBe('CLOSED');
      if (claim.ok) {
        // The cancel re-scoped to include the new agent and freed it.
        expect((await fx.store.getAgent('A'))?.activeAssignment).toBeNull();
      }
    });
  });

  describe('closeActiveFor', () => {
    it('should close the agent assignment', async () => {
      await seedConversation();
      const result = await fx.desk.router.closeActiveFor('agent', 'A');
      expect(result).toMatchObject({ ok: true, alreadyClosed: false, request: { id: 'R1', closedBy: 'agent' } });
    });

    it('should close the customer conversation', async () => {
      await seedConversation();
      const result = await fx.desk.router.closeActiveFor('customer', 'u1');
      expect(result).toMatchObject({ ok: true, request: { id: 'R1', closedBy: 'customer' } });
    });

    it('should refuse a customer whose request is still open', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      expect(await fx.desk.router.closeActiveFor('customer', 'u1')).toEqual({ ok: false, error: 'NoActiveAssignment' });
    });

    it('should refuse an idle agent', async () => {
      await seedAgents(fx.store, makeAgent('A'));
      expect(await fx.desk.router.closeActiveFor('agent', 'A')).toEqual({ ok: false, error: 'NoActiveAssignment' });
    });
  });
});
