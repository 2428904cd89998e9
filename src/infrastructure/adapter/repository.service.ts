import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_REPOSITORY_NAME } from '../../core/model/model';
import { Repository } from '../../core/model/repository';
import { SqlAdapterService } from './sql-adapter.service';

/**
 * Named repositories backed by the SQL adapter.
 */
@Injectable()
export class RepositoryService {
  private readonly repositories = new Map<string, Repository>();

  constructor(
    private readonly sqlAdapter: SqlAdapterService,
    private readonly configService: ConfigService,
  ) {}

  get defaultName(): string {
    return this.configService.get<string>('DB_REPOSITORY') || DEFAULT_REPOSITORY_NAME;
  }

  repository(name: string = this.defaultName): Repository {
    let repository = this.repositories.get(name);
    if (!repository) {
      repository = new Repository(name, this.sqlAdapter);
      this.repositories.set(name, repository);
    }
    return repository;
  }
}
