// src/db/database.service.ts
import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient } from 'pg';
import type { AppConfig } from '../config/configuration';

/** Lo único que los repositorios necesitan de una conexión. */
export type Queryable = Pick<PoolClient, 'query'>;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(config: ConfigService<AppConfig, true>) {
    const db = config.get('database', { infer: true });
    this.pool = new Pool({ connectionString: db.url, max: db.poolMax });
    this.pool.on('error', (err) =>
      this.logger.error(`Error en conexión inactiva: ${err.message}`),
    );
  }

  async onModuleInit() {
    const client = await this.pool.connect();
    client.release();
    this.logger.log('Pool de Postgres listo');
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  /**
   * Ejecuta `work` dentro de BEGIN/COMMIT. Cualquier error (incluido el de un
   * handler de eventos) hace ROLLBACK y se relanza.
   */
  async transaction<T>(work: (tx: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }
}
