/**
 * Event emitter for branding lifecycle events
 *
 * The integration publishes entry and hook changes here; the entry update
 * listener and the server's diagnostics log subscribe to them.
 */

import type { BrandingEntry } from '@branding/types';
import { createLogger } from '@branding/utils';

const logger = createLogger('Events');

export interface BrandingEventMap {
  'branding:entry-created': BrandingEntry;
  'branding:entry-updated': BrandingEntry;
  'branding:entry-removed': { entryId: string };
  'branding:hooks-applied': { entryId: string | null };
  'branding:hooks-removed': { entryId: string | null };
}

export type EventType = keyof BrandingEventMap;

/** Event with its type-specific payload */
export type BrandingEvent = {
  [K in EventType]: { type: K; payload: BrandingEventMap[K] };
}[EventType];

export type EventCallback = (event: BrandingEvent) => void;

export interface EventEmitter {
  emit: (event: BrandingEvent) => void;
  subscribe: (callback: EventCallback) => () => void;
}

export function createEventEmitter(): EventEmitter {
  const subscribers = new Set<EventCallback>();

  return {
    emit(event: BrandingEvent) {
      for (const callback of subscribers) {
        try {
          callback(event);
        } catch (error) {
          logger.error('Error in event subscriber:', error);
        }
      }
    },

    subscribe(callback: EventCallback) {
      subscribers.add(callback);
      return () => {
        subscribers.delete(callback);
      };
    },
  };
}
