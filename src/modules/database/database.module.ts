import { Global, Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { DatabaseService } from './database.service';
import { TransactionManager } from './transaction-manager';

@Global()
@Module({
  imports: [AppConfigModule],
  providers: [DatabaseService, { provide: TransactionManager, useExisting: DatabaseService }],
  exports: [DatabaseService, TransactionManager],
})
export class DatabaseModule {}
