import { QueryResultRow } from 'pg';
import { query } from '../../config/database';
import { errorMessage } from '../../utils/helpers';
import { Logger, logger as defaultLogger } from '../../utils/logger';

export type QueryRunner = <T extends QueryResultRow>(sql: string, params?: unknown[]) => Promise<T[]>;

export abstract class BaseService {
  constructor(
    protected readonly logger: Logger = defaultLogger,
    private readonly runQuery: QueryRunner = query
  ) {}

  protected async executeQuery<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    try {
      return await this.runQuery<T>(sql, params);
    } catch (error) {
      this.logger.error(`Database query error: ${sql}`, error);
      throw new Error(`Database error: ${errorMessage(error)}`);
    }
  }

  protected sanitizeInput(input: string): string {
    return input.trim();
  }
}
