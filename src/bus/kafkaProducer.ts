/**
 * Kafka Producer Module
 *
 * Publishes service events. Uses KafkaJS, which is compatible with Kafka and
 * Redpanda brokers. When Kafka is disabled the publisher is a no-op.
 */

import { Kafka, logLevel, type Producer } from 'kafkajs';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { KafkaError, toError } from '../errors/index.js';
import type { ServiceEvent } from '../models/messages.js';

export interface EventPublisher {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Never rejects; a failed publish is logged */
  publish(event: ServiceEvent): Promise<void>;
}

export const noopPublisher: EventPublisher = {
  async start() {},
  async stop() {},
  async publish(event) {
    logger.debug({ eventType: event.eventType, gameId: event.gameId }, 'Event not published (Kafka disabled)');
  }
};

/**
 * Creates a publisher writing JSON events to the configured topic
 *
 * Messages are keyed by game id so one game's events stay ordered.
 */
export function createKafkaPublisher(producer: Producer = defaultProducer(), topic: string = cfg.kafka.topicEvents): EventPublisher {
  return {
    async start() {
      logger.info({ brokers: cfg.kafka.brokers }, 'Connecting to Kafka brokers...');
      try {
        await producer.connect();
      } catch (err) {
        const error = toError(err);
        throw new KafkaError(`Failed to connect producer: ${error.message}`, 'connect', error);
      }
      logger.info({ brokers: cfg.kafka.brokers }, 'Kafka producer connected');
    },

    async stop() {
      await producer.disconnect();
    },

    async publish(event) {
      try {
        await producer.send({
          topic,
          messages: [{ key: event.gameId, value: JSON.stringify(event) }]
        });
      } catch (err) {
        logger.error({ err, eventType: event.eventType, gameId: event.gameId }, 'Failed to publish event');
      }
    }
  };
}

function defaultProducer(): Producer {
  const kafka = new Kafka({
    clientId: cfg.kafka.clientId,
    brokers: cfg.kafka.brokers,
    logLevel: logLevel.ERROR
  });
  return kafka.producer();
}

/**
 * Publisher matching the configuration
 */
export function createEventPublisher(): EventPublisher {
  return cfg.kafka.enabled ? createKafkaPublisher() : noopPublisher;
}
