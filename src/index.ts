import 'reflect-metadata';

export * from './core/exceptions/custom-exceptions';
export * from './core/exceptions/exceptions.module';
export * from './core/exceptions/services/logging.service';
export * from './core/property/property.types';
export * from './core/property/field-type.registry';
export * from './core/property/property';
export * from './core/property/property-set';
export * from './core/query/range';
export * from './core/query/condition';
export * from './core/query/link';
export * from './core/query/query';
export * from './core/model/interfaces/adapter.interface';
export * from './core/model/model';
export * from './core/model/resource';
export * from './core/model/repository';
export * from './core/model/model-registry';
export * from './shared/types/query-builder.types';
export * from './shared/utils/naming-helpers';
export * from './infrastructure/sql/sql-dialect';
export * from './infrastructure/sql/sql-statement.builder';
export * from './infrastructure/sql/row-decoder';
export * from './infrastructure/knex/knex.service';
export * from './infrastructure/knex/knex.module';
export * from './infrastructure/knex/utils/uri-parser';
export * from './infrastructure/adapter/sql-adapter.service';
export * from './infrastructure/adapter/repository.service';
export * from './infrastructure/adapter/adapter.module';
export * from './orm.module';
