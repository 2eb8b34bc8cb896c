import { Logger } from '@nestjs/common';
import type { EventRecord } from '@postboard/application';
import {
  FatalSchemaError,
  UnknownEventTypeError,
  type DomainEvent,
} from '@postboard/domain';
import type {
  DispatchOutcome,
  ProjectionHandler,
  ProjectionStore,
  ProjectionTable,
  VersionedView,
} from './types';

/**
 * Routes decoded records to their projection handler through an explicit
 * table, and writes the result only when it moves the view forward.
 *
 * The table is checked against the codec's event kinds when constructed, so a
 * missing or stray handler stops startup instead of surfacing mid-stream.
 */
export class ProjectionDispatcher<
  TEvent extends DomainEvent,
  TView extends VersionedView,
> {
  private readonly logger: Logger;
  private readonly handlers: ReadonlyMap<
    string,
    ProjectionHandler<TEvent, TView>
  >;

  constructor(
    readonly name: string,
    table: ProjectionTable<TEvent, TView>,
    knownEventTypes: readonly string[],
    private readonly store: ProjectionStore<TView>
  ) {
    this.logger = new Logger(`${ProjectionDispatcher.name}:${name}`);
    const entries: Array<[string, ProjectionHandler<TEvent, TView>]> =
      Object.entries(table);
    const known = new Set(knownEventTypes);
    const missing = knownEventTypes.filter(
      (type) => !entries.some(([key]) => key === type)
    );
    const extra = entries
      .map(([key]) => key)
      .filter((key) => !known.has(key));
    const mislabelled = entries
      .filter(([key, handler]) => handler.eventType !== key)
      .map(([key]) => key);
    if (missing.length > 0 || extra.length > 0 || mislabelled.length > 0) {
      throw new FatalSchemaError(
        `Projection ${name} handler table mismatch: ` +
          `missing [${missing.join(', ')}], ` +
          `unexpected [${extra.join(', ')}], ` +
          `mislabelled [${mislabelled.join(', ')}]`
      );
    }
    this.handlers = new Map(entries);
  }

  async dispatch(record: EventRecord<TEvent>): Promise<DispatchOutcome> {
    const handler = this.handlers.get(record.event.eventType);
    if (!handler) {
      throw new UnknownEventTypeError(record.event.eventType);
    }

    const current = await this.store.get(record.aggregateId);
    if (current && record.version <= current.version) {
      this.logger.debug(
        `Skipping ${record.event.eventType} ${record.aggregateId}@${record.version}; view is at ${current.version}`
      );
      return 'skipped';
    }
    if (current && record.version > current.version + 1) {
      // The missing versions arrive on republish; applying now would make
      // them look stale.
      this.logger.warn(
        `Gap in ${record.aggregateId}: view at ${current.version}, holding back ${record.event.eventType}@${record.version}`
      );
      return 'skipped';
    }

    const next = handler.apply(current, record);
    if (!next) {
      this.logger.warn(
        `No view for ${record.aggregateId}; dropping ${record.event.eventType}@${record.version}`
      );
      return 'skipped';
    }
    await this.store.save(record.aggregateId, next);
    return 'applied';
  }
}
