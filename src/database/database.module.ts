import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { MigrationService } from './migration.service';

@Global()
@Module({
  providers: [DatabaseService, MigrationService],
  exports: [DatabaseService],
})
export class DatabaseModule {}
