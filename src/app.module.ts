import { Module } from '@nestjs/common';
import { DatabaseModule } from './database/database.module';
import { NetworkModule } from './network/network.module';

@Module({
  imports: [DatabaseModule, NetworkModule],
})
export class AppModule {}
