import { z } from 'zod';
import { Argon2Digest, type Digest } from '../../domain/auth/digest.js';
import { InvalidArgumentError, requireNonEmpty } from '../../domain/auth/errors.js';
import { createUser, toUserId, type User, type UserId } from '../../domain/auth/user.js';
import { SqlLiteral, type UserStore, type UserValues } from '../../domain/auth/userStore.js';
import type { Logger } from '../logger.js';
import {
  isValidIdentifier,
  quoteIdentifier,
  type SqlExecutor,
} from './sqlExecutor.js';

const identifier = z
  .string()
  .refine(isValidIdentifier, { message: 'must be a plain SQL identifier' });

/**
 * Table and column names of the credential table. The table needs at least
 * a primary key, a unique username and a password hash column:
 *
 *     CREATE TABLE users (
 *       id SERIAL PRIMARY KEY,
 *       username VARCHAR(255) NOT NULL UNIQUE,
 *       password TEXT NOT NULL
 *     );
 */
export const userSchemaOptions = z.object({
  usersTable: identifier.default('users'),
  idField: identifier.default('id'),
  usernameField: identifier.default('username'),
  passwordField: identifier.default('password'),
  /** Additional columns returned in `User.row`. */
  extraColumns: z.array(identifier).default([]),
});

export type UserSchemaOptions = z.input<typeof userSchemaOptions>;

export interface SqlUserStoreOptions extends UserSchemaOptions {
  digest?: Digest;
  logger?: Logger;
}

/** Hashed once per store and checked against when the username is unknown. */
const DUMMY_PASSWORD = 'unknown-user-placeholder';

export class SqlUserStore implements UserStore {
  readonly usersTable: string;
  readonly idField: string;
  readonly usernameField: string;
  readonly passwordField: string;
  readonly extraColumns: readonly string[];
  private readonly digest: Digest;
  private readonly logger: Logger;
  private dummyHash?: Promise<string>;

  constructor(
    private readonly executor: SqlExecutor,
    options: SqlUserStoreOptions = {}
  ) {
    const schema = userSchemaOptions.parse(options);
    this.usersTable = schema.usersTable;
    this.idField = schema.idField;
    this.usernameField = schema.usernameField;
    this.passwordField = schema.passwordField;
    // id and password are selected explicitly; never twice, never as extras
    this.extraColumns = Object.freeze(
      [...new Set(schema.extraColumns)].filter(
        (column) => column !== schema.idField && column !== schema.passwordField
      )
    );
    this.digest = options.digest ?? new Argon2Digest();
    this.logger = options.logger ?? console;
  }

  loadUser(username: string, password: string): Promise<User | null> {
    requireNonEmpty(username, 'username');
    requireNonEmpty(password, 'password');
    return this.authenticate(username, password);
  }

  loadUserById(userId: UserId): Promise<User | null> {
    requireNonEmpty(userId, 'user id');
    return this.findById(userId);
  }

  storeUser(username: string, password: string, extraValues?: UserValues): Promise<User | null> {
    requireNonEmpty(username, 'username');
    requireNonEmpty(password, 'password');
    for (const column of Object.keys(extraValues ?? {})) {
      if (!isValidIdentifier(column)) {
        throw new InvalidArgumentError(`invalid column name: ${column}`);
      }
    }
    return this.insert(username, password, extraValues ?? {});
  }

  private async authenticate(username: string, password: string): Promise<User | null> {
    const rows = await this.executor.query(
      `SELECT ${this.selection(true)} FROM ${quoteIdentifier(this.usersTable)} ` +
        `WHERE ${quoteIdentifier(this.usernameField)} = ${this.executor.placeholder(1)}`,
      [username]
    );

    // Unknown user and wrong password must look the same to the caller,
    // in result and in time: both pay for one digest validation.
    const record = rows[0];
    const storedHash = record?.[this.passwordField];
    if (record === undefined || typeof storedHash !== 'string' || storedHash === '') {
      await this.digest.validate(await this.getDummyHash(), password);
      this.logger.warn('unable to load user', { username });
      return null;
    }
    if (!(await this.digest.validate(storedHash, password))) {
      this.logger.warn('unable to load user', { username });
      return null;
    }

    return this.toUser(record, { username });
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.digest.generate(DUMMY_PASSWORD);
    }
    return this.dummyHash;
  }

  private async findById(userId: UserId): Promise<User | null> {
    const rows = await this.executor.query(
      `SELECT ${this.selection(false)} FROM ${quoteIdentifier(this.usersTable)} ` +
        `WHERE ${quoteIdentifier(this.idField)} = ${this.executor.placeholder(1)}`,
      [userId]
    );
    return this.toUser(rows[0], { userId });
  }

  private async insert(
    username: string,
    password: string,
    extraValues: UserValues
  ): Promise<User | null> {
    const values: UserValues = {
      ...extraValues,
      [this.usernameField]: username,
      [this.passwordField]: await this.digest.generate(password),
    };
    const columns = Object.keys(values);
    const params: unknown[] = [];
    const expressions = columns.map((column) => {
      const value = values[column];
      if (value instanceof SqlLiteral) {
        return value.sql;
      }
      params.push(value);
      return this.executor.placeholder(params.length);
    });

    // Single statement: the returned id always belongs to this insert.
    const rows = await this.executor.query(
      `INSERT INTO ${quoteIdentifier(this.usersTable)} ` +
        `(${columns.map(quoteIdentifier).join(', ')}) VALUES (${expressions.join(', ')}) ` +
        `RETURNING ${this.selection(false)}`,
      params
    );
    return this.toUser(rows[0], { username });
  }

  /**
   * Mandatory fields first, then the configured extra columns.
   */
  private selection(withPassword: boolean): string {
    const columns = withPassword
      ? [this.idField, this.passwordField, ...this.extraColumns]
      : [this.idField, ...this.extraColumns];
    return columns.map(quoteIdentifier).join(', ');
  }

  private toUser(
    record: Record<string, unknown> | undefined,
    context: Record<string, unknown>
  ): User | null {
    const id = record === undefined ? null : toUserId(record[this.idField]);
    if (record === undefined || id === null) {
      this.logger.warn('unable to load user', context);
      return null;
    }

    const row: Record<string, unknown> = {};
    for (const [column, value] of Object.entries(record)) {
      if (column !== this.idField && column !== this.passwordField) {
        row[column] = value;
      }
    }
    return createUser(id, row);
  }
}
