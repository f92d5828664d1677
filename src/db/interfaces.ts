import type { DeepPartial, FindManyOptions, FindOneOptions, ObjectLiteral } from "typeorm";

/**
 * Database Interfaces
 *
 * The subset of TypeORM's repository API the routes and the worker use,
 * so tests can hand in plain in-memory fakes.
 */

export interface IRepository<T extends ObjectLiteral> {
    findOne(options: FindOneOptions<T>): Promise<T | null>;
    find(options?: FindManyOptions<T>): Promise<T[]>;
    create(data: DeepPartial<T>): T;
    save(entity: T): Promise<T>;
}
