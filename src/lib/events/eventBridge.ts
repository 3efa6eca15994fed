import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { env } from '../../config/env';
import type { DetailType, LifecycleEvent } from '../jobs/model';

export type BusMessage = {
  source: string;
  detailType: DetailType;
  detail: LifecycleEvent;
};

/** A message bus addressed by topic. Implementations may throw; callers decide what a failure means. */
export interface EventBus {
  publishMessage(topic: string, message: BusMessage): Promise<void>;
}

export class EventPublishError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventPublishError';
  }
}

let client: EventBridgeClient | null = null;

export function getEventBridgeClient(): EventBridgeClient {
  if (!client) {
    client = new EventBridgeClient({ region: env.AWS_REGION });
  }

  return client;
}

export function createEventBridgeBus(eventBridge: EventBridgeClient = getEventBridgeClient()): EventBus {
  return {
    async publishMessage(topic, message) {
      const res = await eventBridge.send(
        new PutEventsCommand({
          Entries: [
            {
              Source: message.source,
              DetailType: message.detailType,
              Detail: JSON.stringify(message.detail),
              EventBusName: topic,
            },
          ],
        })
      );

      // PutEvents reports per-entry failures in a 200 response.
      if ((res.FailedEntryCount ?? 0) > 0) {
        const entry = res.Entries?.[0];
        throw new EventPublishError(
          `${entry?.ErrorCode ?? 'Unknown'} - ${entry?.ErrorMessage ?? 'Unknown error'}`
        );
      }
    },
  };
}
