import * as path from 'path';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ExceptionsModule } from './core/exceptions/exceptions.module';
import { AdapterModule } from './infrastructure/adapter/adapter.module';
import { KnexModule } from './infrastructure/knex/knex.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: path.resolve(__dirname, '../.env'),
    }),
    ExceptionsModule,
    KnexModule,
    AdapterModule,
  ],
  exports: [AdapterModule],
})
export class OrmModule {}
