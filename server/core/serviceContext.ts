import type { ActorDirectory } from './actorDirectory';
import type { OfficeStore } from './store/types';

export interface ServiceContext {
  store: OfficeStore;
  directory: ActorDirectory;
  /** Clock for every timestamp a service writes. */
  now: () => Date;
}
