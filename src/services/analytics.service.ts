import { addJob } from '../jobs/queues.js';

export interface ItemsShownEvent {
  userId: string;
  sessionId: string;
  itemIds: string[];
  offset: number;
  requestId?: string;
}

export interface ItemConsumedEvent {
  userId: string;
  sessionId: string | null;
  itemId: string;
  action: 'play' | 'complete' | 'save' | 'share';
  dwellMs?: number;
}

/** Egress for engagement events. Callers never await delivery on the response path. */
export interface AnalyticsEmitter {
  itemsShown(event: ItemsShownEvent): Promise<void>;
  itemConsumed(event: ItemConsumedEvent): Promise<void>;
}

export const analyticsService: AnalyticsEmitter = {
  async itemsShown(event) {
    await addJob('feed-events', 'item-shown', { ...event, at: new Date().toISOString() });
  },

  async itemConsumed(event) {
    await addJob('feed-events', 'item-consumed', { ...event, at: new Date().toISOString() });
  },
};
