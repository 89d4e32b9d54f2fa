/**
 * Bridges between in-process events and the broker.
 *
 * EventPublisher forwards named events to routing keys. EventConsumer maps routing keys
 * back to event names and re-emits the payloads on a local EventEmitter.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { toError } from './errors';
import { createLogger, type Logger } from './logger';
import type { MessagingService, ServiceConsumeOptions } from './service';
import type { Delivery } from './types';

/**
 * Metadata attached to every event body under `_metadata`.
 */
export interface EventMetadata {
  event: string;
  /** Unix time in seconds. */
  timestamp: number;
  id: string;
}

export type EventPayload = Record<string, unknown>;

export interface EventBridgeOptions {
  debug?: boolean;
  logger?: Logger;
}

const METADATA_KEY = '_metadata';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && ! Array.isArray(value);

/**
 * Derives a dotted routing key from an event name.
 * `OrderCreatedEvent` and `order_created` both become `order.created`.
 */
export const deriveRoutingKey = (eventName: string): string =>
  eventName
    .replace(/Event$/, '')
    .replace(/([a-z0-9])([A-Z])/g, '$1.$2')
    .split(/[\s._\-\\/]+/)
    .filter((word) => word !== '')
    .map((word) => word.toLowerCase())
    .join('.');

/**
 * Matches a routing key against a topic pattern.
 * `*` stands for exactly one word, `#` for zero or more words.
 */
export const matchesRoutingPattern = (pattern: string, routingKey: string): boolean => {
  const match = (patternWords: string[], keyWords: string[]): boolean => {
    if (patternWords.length === 0) {
      return keyWords.length === 0;
    }

    const [head, ...rest] = patternWords;
    if (head === '#') {
      for (let skip = 0; skip <= keyWords.length; skip++) {
        if (match(rest, keyWords.slice(skip))) {
          return true;
        }
      }
      return false;
    }

    if (keyWords.length === 0) {
      return false;
    }

    return (head === '*' || head === keyWords[0]) && match(rest, keyWords.slice(1));
  };

  return match(pattern.split('.'), routingKey === '' ? [] : routingKey.split('.'));
};

export class EventPublisher {
  private service: Pick<MessagingService, 'publish'>;
  private eventMap: Map<string, string>;
  private logger: Logger;

  /**
   * @param service - Service messages are published through
   * @param eventMap - Event name to routing key
   */
  constructor(
    service: Pick<MessagingService, 'publish'>,
    eventMap: Record<string, string> = {},
    options: EventBridgeOptions = {}
  ) {
    this.service = service;
    this.eventMap = new Map(Object.entries(eventMap));
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Forwards every mapped event emitted on a local emitter to the broker.
   */
  subscribe(emitter: EventEmitter): this {
    for (const eventName of this.eventMap.keys()) {
      emitter.on(eventName, (payload: EventPayload) => {
        this.publishEvent(eventName, payload).catch((error: unknown) => {
          this.logger.error(`Failed to forward event ${eventName}`, toError(error));
        });
      });
    }

    return this;
  }

  /**
   * Publishes an event with `_metadata` attached.
   *
   * @param routingKey - Overrides the mapped or derived routing key
   */
  async publishEvent(eventName: string, payload: EventPayload, routingKey?: string): Promise<boolean> {
    const metadata: EventMetadata = {
      event: eventName,
      timestamp: Math.floor(Date.now() / 1000),
      id: randomUUID(),
    };

    const data = { ...payload, [METADATA_KEY]: metadata };

    return this.service.publish(routingKey ?? this.getRoutingKey(eventName), data);
  }

  getRoutingKey(eventName: string): string {
    return this.eventMap.get(eventName) ?? deriveRoutingKey(eventName);
  }

  addEvent(eventName: string, routingKey: string): this {
    this.eventMap.set(eventName, routingKey);
    return this;
  }

  setEventMap(eventMap: Record<string, string>): this {
    this.eventMap = new Map(Object.entries(eventMap));
    return this;
  }
}

export class EventConsumer {
  private service: Pick<MessagingService, 'consume'>;
  private emitter: EventEmitter;
  private eventMap: Map<string, string>;
  private debug: boolean;
  private logger: Logger;

  /**
   * @param service - Service messages are consumed through
   * @param emitter - Emitter events are dispatched on
   * @param eventMap - Routing pattern to event name
   */
  constructor(
    service: Pick<MessagingService, 'consume'>,
    emitter: EventEmitter = new EventEmitter(),
    eventMap: Record<string, string> = {},
    options: EventBridgeOptions = {}
  ) {
    this.service = service;
    this.emitter = emitter;
    this.eventMap = new Map(Object.entries(eventMap));
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Consumes a queue and dispatches its events until consumption ends.
   */
  async consumeEvents(
    queueName: string,
    bindingKeys: string[] = [],
    options: Omit<ServiceConsumeOptions, 'bindingKeys'> = {}
  ): Promise<void> {
    await this.service.consume(queueName, (data, delivery) => this.processMessage(data, delivery), {
      ...options,
      bindingKeys,
    });
  }

  /**
   * Dispatches one decoded message.
   *
   * The event name comes from `_metadata.event`, or else from the first pattern matching the routing key.
   * Messages with no event name are acknowledged and dropped. Listener errors propagate to the caller.
   *
   * @returns false when the body is not an event object
   */
  processMessage(data: unknown, delivery: Delivery): boolean {
    const { routingKey, deliveryTag } = delivery.fields;

    if (! isRecord(data)) {
      this.logger.error('Error processing message: body is not an object', { routingKey, deliveryTag });
      return false;
    }

    const { [METADATA_KEY]: metadata, ...body } = data;
    const declared = isRecord(metadata) && typeof metadata.event === 'string' ? metadata.event : null;
    const eventName = declared ?? this.determineEventName(routingKey);

    if (eventName === null) {
      this.logger.warn(`Could not determine event for message with routing key: ${routingKey}`);
      return true;
    }

    this.dispatchEvent(eventName, body, delivery);
    return true;
  }

  /**
   * Finds the event name mapped to a routing key. Exact mappings win over patterns.
   */
  determineEventName(routingKey: string): string | null {
    const exact = this.eventMap.get(routingKey);
    if (exact !== undefined) {
      return exact;
    }

    for (const [pattern, eventName] of this.eventMap) {
      if (matchesRoutingPattern(pattern, routingKey)) {
        return eventName;
      }
    }

    return null;
  }

  addEventMapping(routingPattern: string, eventName: string): this {
    this.eventMap.set(routingPattern, eventName);
    return this;
  }

  setEventMap(eventMap: Record<string, string>): this {
    this.eventMap = new Map(Object.entries(eventMap));
    return this;
  }

  getEmitter(): EventEmitter {
    return this.emitter;
  }

  private dispatchEvent(eventName: string, body: Record<string, unknown>, delivery: Delivery): void {
    if (this.emitter.listenerCount(eventName) === 0) {
      this.logger.warn(`No listeners for event: ${eventName}`);
      return;
    }

    this.emitter.emit(eventName, body, delivery);

    if (this.debug) {
      this.logger.debug(`Dispatched event: ${eventName}`);
    }
  }
}
