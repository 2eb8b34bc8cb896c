import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  InMemoryEventBus,
  KafkaBusProducer,
  KafkaPartitionSource,
  type BusProducer,
  type PartitionSource,
} from '@postboard/infrastructure';
import { Kafka } from 'kafkajs';
import type { Env } from '../../../config/env';

/**
 * Producer and partition source for the configured bus driver. The memory
 * driver uses one in-process bus for both sides.
 */
@Injectable()
export class BusService implements OnApplicationShutdown {
  private readonly logger = new Logger(BusService.name);
  readonly producer: BusProducer;
  readonly source: PartitionSource;

  constructor(@Inject(ConfigService) config: ConfigService<Env, true>) {
    if (config.get('BUS_DRIVER', { infer: true }) === 'kafka') {
      const brokers = config.get('KAFKA_BROKERS', { infer: true });
      const kafka = new Kafka({
        clientId: config.get('KAFKA_CLIENT_ID', { infer: true }),
        brokers,
      });
      this.producer = KafkaBusProducer.fromKafka(kafka);
      this.source = KafkaPartitionSource.fromKafka(kafka);
      this.logger.log(`Using kafka bus at ${brokers.join(',')}`);
      return;
    }
    const bus = new InMemoryEventBus(
      config.get('MEMORY_BUS_PARTITIONS', { infer: true })
    );
    this.producer = bus;
    this.source = bus.subscriber();
    this.logger.log(`Using in-process bus (${bus.partitions} partitions)`);
  }

  async onApplicationShutdown(): Promise<void> {
    await this.producer.close();
  }
}
