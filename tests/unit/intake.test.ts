import {
  createDeskFixture,
  DeskFixture,
  makeAgent,
  seedAgents,
  seedOpenRequest,
} from '../helpers/desk-fixtures';

describe('Intake', () => {
  let fx: DeskFixture;

  beforeEach(() => {
    fx = createDeskFixture();
  });

  async function readyCustomer(userId: string, language = 'en'): Promise<void> {
    await fx.desk.intake.startSession(userId);
    await fx.desk.intake.selectLanguage(userId, language);
  }

  describe('startSession', () => {
    it('should create the user and offer the language catalog', async () => {
      const result = await fx.desk.intake.startSession('u1', 'Dana');

      expect(result.kind).toBe('choose_language');
      if (result.kind !== 'choose_language') return;
      expect(result.languages.map((l) => l.code)).toEqual(['en', 'es', 'fr', 'de']);
      expect(await fx.store.getUser('u1')).toMatchObject({
        id: 'u1',
        displayName: 'Dana',
        language: null,
        activeRequestId: null,
      });
    });

    it('should hand back an open request unchanged', async () => {
      const request = await seedOpenRequest(fx.store, 'R1', 'u1', { language: 'es' });

      const result = await fx.desk.intake.startSession('u1');

      expect(result).toMatchObject({ kind: 'pending', request });
      expect(await fx.store.getUser('u1')).toMatchObject({ language: 'es', activeRequestId: 'R1' });
      expect(await fx.store.getRequest('R1')).toEqual(request);
    });

    it('should report a conversation in progress', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1', { status: 'ASSIGNED', assignedAgentId: 'A' });
      const result = await fx.desk.intake.startSession('u1');
      expect(result.kind).toBe('in_conversation');
    });

    it('should clear a previously selected language', async () => {
      await readyCustomer('u1', 'fr');
      await fx.desk.intake.startSession('u1');
      expect((await fx.store.getUser('u1'))?.language).toBeNull();
    });
  });

  describe('selectLanguage', () => {
    it('should store the normalized code', async () => {
      await fx.desk.intake.startSession('u1');
      const result = await fx.desk.intake.selectLanguage('u1', 'ES');
      expect(result).toMatchObject({ ok: true, user: { language: 'es' } });
    });

    it('should reject a code outside the catalog', async () => {
      await fx.desk.intake.startSession('u1');
      expect(await fx.desk.intake.selectLanguage('u1', 'xx')).toEqual({ ok: false, error: 'InvalidLanguage' });
    });

    it('should reject an unknown user', async () => {
      expect(await fx.desk.intake.selectLanguage('ghost', 'en')).toEqual({ ok: false, error: 'NotFound' });
    });

    it('should reject a change while a request is active', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      expect(await fx.desk.intake.selectLanguage('u1', 'fr')).toEqual({ ok: false, error: 'ActiveRequestExists' });
    });
  });

  describe('openRequest', () => {
    it('should create an open request and broadcast it to eligible agents only', async () => {
      await seedAgents(
        fx.store,
        makeAgent('es-1', { languages: ['es'] }),
        makeAgent('en-1', { languages: ['en'] }),
        makeAgent('es-away', { languages: ['es'], available: false }),
      );
      await readyCustomer('u1', 'es');

      const result = await fx.desk.intake.openRequest('u1', 'Mi pedido no llegó');

      expect(result).toMatchObject({ ok: true, created: true, notified: 1 });
      if (!result.ok) return;
      expect(result.request).toMatchObject({
        userId: 'u1',
        language: 'es',
        initialQuery: 'Mi pedido no llegó',
        status: 'OPEN',
        assignedAgentId: null,
      });
      expect((await fx.store.getUser('u1'))?.activeRequestId).toBe(result.request.id);
      expect((await fx.store.listMessages(result.request.id)).map((m) => m.body)).toEqual(['Mi pedido no llegó']);
      expect(await fx.store.listBroadcastRecipients(result.request.id)).toEqual(['es-1']);

      const [broadcast, agents] = fx.gateway.broadcastNewRequest.mock.calls[0];
      expect(broadcast.id).toBe(result.request.id);
      expect(agents.map((a) => a.id)).toEqual(['es-1']);
    });

    it('should tell the customer when no agent qualifies', async () => {
      await readyCustomer('u1', 'de');

      const result = await fx.desk.intake.openRequest('u1', 'Hallo');

      expect(result).toMatchObject({ ok: true, created: true, notified: 0 });
      expect(fx.gateway.notifyNoAgentsAvailable).toHaveBeenCalledTimes(1);
      expect(fx.gateway.broadcastNewRequest).not.toHaveBeenCalled();
    });

    it('should log follow-up text against the pending request', async () => {
      await readyCustomer('u1');
      const first = await fx.desk.intake.openRequest('u1', 'first');
      if (!first.ok) throw new Error('request was not opened');

      const second = await fx.desk.intake.openRequest('u1', 'second');

      expect(second).toMatchObject({ ok: true, created: false, request: { id: first.request.id } });
      expect((await fx.store.listMessages(first.request.id)).map((m) => m.body)).toEqual(['first', 'second']);
      expect(await fx.store.listRequests()).toHaveLength(1);
    });

    it('should require a language', async () => {
      await fx.desk.intake.startSession('u1');
      expect(await fx.desk.intake.openRequest('u1', 'help')).toEqual({ ok: false, error: 'LanguageNotSelected' });
      expect(await fx.store.listRequests()).toEqual([]);
    });

    it('should reject an unknown user', async () => {
      expect(await fx.desk.intake.openRequest('ghost', 'help')).toEqual({ ok: false, error: 'NotFound' });
    });

    it('should reject a second request while one is assigned', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1', { status: 'ASSIGNED', assignedAgentId: 'A' });
      expect(await fx.desk.intake.openRequest('u1', 'again')).toEqual({ ok: false, error: 'ActiveRequestExists' });
    });
  });

  describe('agents', () => {
    it('should register once', async () => {
      const first = await fx.desk.intake.registerAgent('A', 'Sam');
      const second = await fx.desk.intake.registerAgent('A', 'Sam');

      expect(first).toMatchObject({ created: true, agent: { id: 'A', languages: [], available: true } });
      expect(second.created).toBe(false);
    });

    it('should set normalized languages', async () => {
      await fx.desk.intake.registerAgent('A');
      const result = await fx.desk.intake.setAgentLanguages('A', 'EN, es');
      expect(result).toMatchObject({ ok: true, agent: { languages: ['en', 'es'] } });
    });

    it('should reject invalid language tokens without writing', async () => {
      await fx.desk.intake.registerAgent('A');
      await fx.desk.intake.setAgentLanguages('A', 'en');

      const result = await fx.desk.intake.setAgentLanguages('A', 'en, elvish');

      expect(result).toEqual({ ok: false, error: 'InvalidLanguage', invalid: ['elvish'] });
      expect((await fx.store.getAgent('A'))?.languages).toEqual(['en']);
    });

    it('should keep a current assignment when languages shrink', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1', { language: 'es' });
      await seedAgents(fx.store, makeAgent('A', { languages: ['en', 'es'] }));
      await fx.desk.arbiter.attemptClaim('R1', 'A');

      await fx.desk.intake.setAgentLanguages('A', 'en');

      expect(await fx.store.getAgent('A')).toMatchObject({ languages: ['en'], activeAssignment: 'R1' });
      expect((await fx.store.getRequest('R1'))?.status).toBe('ASSIGNED');
    });

    it('should offer matching pending requests when an agent becomes available', async () => {
      await seedOpenRequest(fx.store, 'R-en', 'u1', { language: 'en' });
      await seedOpenRequest(fx.store, 'R-fr', 'u2', { language: 'fr' });
      await seedAgents(fx.store, makeAgent('A', { languages: ['en'], available: false }));

      const result = await fx.desk.intake.toggleAvailability('A');

      expect(result).toMatchObject({ ok: true, agent: { available: true }, offered: 1 });
      expect(fx.gateway.broadcastNewRequest).toHaveBeenCalledTimes(1);
      const [request, agents] = fx.gateway.broadcastNewRequest.mock.calls[0];
      expect(request.id).toBe('R-en');
      expect(agents.map((a) => a.id)).toEqual(['A']);
      expect(await fx.store.listBroadcastRecipients('R-en')).toEqual(['A']);
    });

    it('should offer nothing when an agent goes unavailable', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      await seedAgents(fx.store, makeAgent('A'));

      const result = await fx.desk.intake.toggleAvailability('A');

      expect(result).toMatchObject({ ok: true, agent: { available: false }, offered: 0 });
      expect(fx.gateway.broadcastNewRequest).not.toHaveBeenCalled();
    });

    it('should list the assignment and claimable requests', async () => {
      await seedOpenRequest(fx.store, 'R1', 'u1');
      await seedOpenRequest(fx.store, 'R2', 'u2');
      await seedAgents(fx.store, makeAgent('A'));

      const result = await fx.desk.intake.listAgentRequests('A');

      expect(result).toMatchObject({ ok: true, assigned: null });
      if (!result.ok) return;
      expect(result.pending.map((r) => r.id)).toEqual(['R1', 'R2']);
      expect(await fx.store.listBroadcastRecipients('R2')).toEqual(['A']);
    });

    it('should report unregistered agents', async () => {
      expect(await fx.desk.intake.toggleAvailability('ghost')).toEqual({ ok: false, error: 'NotFound' });
      expect(await fx.desk.intake.listAgentRequests('ghost')).toEqual({ ok: false, error: 'NotFound' });
      expect(await fx.desk.intake.setAgentLanguages('ghost', 'en')).toEqual({ ok: false, error: 'NotFound' });
    });
  });
});
