import { InMemoryEntityStore } from '../../src/store';
import { Matcher } from '../../src/desk/matcher';
import { makeAgent, makeRequest, seedAgents, seedOpenRequest } from '../helpers/desk-fixtures';

describe('Matcher', () => {
  let store: InMemoryEntityStore;
  let matcher: Matcher;

  beforeEach(() => {
    store = new InMemoryEntityStore();
    matcher = new Matcher(store);
  });

  describe('eligibleAgents', () => {
    it('should return exactly the available, free agents who speak the language', async () => {
      await seedAgents(
        store,
        makeAgent('speaks-es', { languages: ['en', 'es'] }),
        makeAgent('english-only', { languages: ['en'] }),
        makeAgent('away', { languages: ['es'], available: false }),
        makeAgent('busy', { languages: ['es'], activeAssignment: 'req-other' }),
        makeAgent('also-es', { languages: ['es'] }),
      );

      const agents = await matcher.eligibleAgents(makeRequest('req-1', 'u1', { language: 'es' }));
      expect(agents.map((a) => a.id)).toEqual(['speaks-es', 'also-es']);
    });

    it('should return an empty list when nobody qualifies', async () => {
      await seedAgents(store, makeAgent('a1', { languages: ['fr'] }));
      const agents = await matcher.eligibleAgents(makeRequest('req-1', 'u1', { language: 'de' }));
      expect(agents).toEqual([]);
    });
  });

  describe('pendingRequestsFor', () => {
    it('should list open requests in the agent languages only', async () => {
      await seedOpenRequest(store, 'req-en', 'u1', { language: 'en' });
      await seedOpenRequest(store, 'req-fr', 'u2', { language: 'fr' });
      await seedOpenRequest(store, 'req-es', 'u3', { language: 'es' });

      const pending = await matcher.pendingRequestsFor(makeAgent('a1', { languages: ['en', 'es'] }));
      expect(pending.map((r) => r.id)).toEqual(['req-en', 'req-es']);
    });

    it('should skip requests that are no longer open', async () => {
      await seedOpenRequest(store, 'req-1', 'u1', { status: 'ASSIGNED', assignedAgentId: 'a9' });
      const pending = await matcher.pendingRequestsFor(makeAgent('a1'));
      expect(pending).toEqual([]);
    });
  });
});
