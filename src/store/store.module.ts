import { Module } from '@nestjs/common';
import { EntityStore } from './entity-store';
import { PostgresEntityStore } from './postgres-entity.store';

@Module({
  providers: [{ provide: EntityStore, useClass: PostgresEntityStore }],
  exports: [EntityStore],
})
export class StoreModule {}
