import { Logger } from '@nestjs/common';
import { TransientInfrastructureError } from '@postboard/application';
import type { Kafka, Producer } from 'kafkajs';
import type { BusProducer, OutgoingMessage } from './types';

/** The part of a kafkajs producer the adapter drives. */
export type MessageProducer = Pick<Producer, 'connect' | 'send' | 'disconnect'>;

/**
 * Idempotent kafkajs producer. One request in flight keeps per-key order
 * across retries.
 */
export class KafkaBusProducer implements BusProducer {
  private readonly logger = new Logger(KafkaBusProducer.name);
  private connecting: Promise<void> | null = null;

  constructor(private readonly producer: MessageProducer) {}

  static fromKafka(kafka: Kafka): KafkaBusProducer {
    return new KafkaBusProducer(
      kafka.producer({
        idempotent: true,
        maxInFlightRequests: 1,
        allowAutoTopicCreation: true,
      })
    );
  }

  async send(
    topic: string,
    messages: readonly OutgoingMessage[]
  ): Promise<void> {
    if (messages.length === 0) return;
    try {
      await this.connect();
      await this.producer.send({
        topic,
        messages: messages.map((message) => ({
          key: message.key,
          value: message.value,
          headers: { ...message.headers },
        })),
      });
    } catch (error) {
      this.connecting = null;
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Publishing ${messages.length} message(s) to ${topic} failed: ${reason}`
      );
      throw new TransientInfrastructureError(
        `Kafka send to ${topic} failed: ${reason}`,
        error
      );
    }
  }

  async close(): Promise<void> {
    this.connecting = null;
    await this.producer.disconnect();
  }

  private connect(): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.producer.connect();
    }
    return this.connecting;
  }
}
