import { Module } from '@nestjs/common';
import { RepositoryService } from './repository.service';
import { SqlAdapterService } from './sql-adapter.service';

@Module({
  providers: [SqlAdapterService, RepositoryService],
  exports: [SqlAdapterService, RepositoryService],
})
export class AdapterModule {}
