/**
 * Indexer-facing hooks that keep supersession chains in step with the index.
 */

import type { SupersessionTracker } from '../supersession/supersession-tracker.js';
import type { RegistrationResult, RemovalResult } from '../supersession/types.js';
import { executeHook } from './hook-utils.js';

export interface SupersessionHookResult {
  /** Registration outcome; null when the document declares no predecessor */
  registration: RegistrationResult | null;
  /** A previous declaration was dropped, either undeclared or replaced by a refused one */
  cleared: boolean;
}

export interface SupersessionHooks {
  /**
   * Document (re)indexed. A declared path registers the relation; no path
   * clears any relation the document declared before.
   */
  onDocumentIndexed(documentId: string, declaredSupersededPath?: string | null): Promise<SupersessionHookResult>;
  /** Document removed: splice it out of its chain. */
  onDocumentDeleted(documentId: string): Promise<RemovalResult>;
}

export function createSupersessionHooks(tracker: SupersessionTracker): SupersessionHooks {
  return {
    async onDocumentIndexed(documentId, declaredSupersededPath) {
      const { result } = await executeHook(
        'supersession.onDocumentIndexed',
        async (): Promise<SupersessionHookResult> => {
          const path = declaredSupersededPath?.trim();
          if (!path) {
            const cleared = await tracker.unregister(documentId);
            return { registration: null, cleared };
          }

          // Rejections are logged by the tracker. A refused declaration still
          // replaces whatever the document declared before.
          const registration = await tracker.register(documentId, path);
          if (registration.success) return { registration, cleared: false };
          return { registration, cleared: await tracker.unregister(documentId) };
        },
        { retry: {} },
      );
      return result;
    },

    async onDocumentDeleted(documentId) {
      const { result } = await executeHook(
        'supersession.onDocumentDeleted',
        () => tracker.removeFromChain(documentId),
        { retry: {} },
      );
      return result;
    },
  };
}
