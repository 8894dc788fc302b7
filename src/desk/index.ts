import { EntityStore } from '../store';
import { LanguageCatalog } from '../config/language-catalog';
import { ClaimArbiter } from './claim-arbiter';
import { ConversationRouter } from './conversation-router';
import { Intake } from './intake';
import { Matcher } from './matcher';
import { Notifier } from './notifier';
import { NotificationGateway } from './types';

export * from './types';
export { ClaimArbiter } from './claim-arbiter';
export { ConversationRouter } from './conversation-router';
export { Intake } from './intake';
export { Matcher } from './matcher';
export { Notifier } from './notifier';

export interface Desk {
  store: EntityStore;
  matcher: Matcher;
  arbiter: ClaimArbiter;
  router: ConversationRouter;
  intake: Intake;
}

export function createDesk(store: EntityStore, gateway: NotificationGateway, catalog: LanguageCatalog): Desk {
  const notifier = new Notifier(gateway);
  const matcher = new Matcher(store);
  return {
    store,
    matcher,
    arbiter: new ClaimArbiter(store, notifier),
    router: new ConversationRouter(store, notifier),
    intake: new Intake(store, matcher, notifier, catalog),
  };
}
