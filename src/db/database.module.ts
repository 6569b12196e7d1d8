// src/db/database.module.ts
import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { UnitOfWork } from './unit-of-work.service';

@Global()
@Module({
  providers: [DatabaseService, UnitOfWork],
  exports: [DatabaseService, UnitOfWork],
})
export class DatabaseModule {}
