import { Injectable, Logger } from '@nestjs/common';
import vault from 'node-vault';
import { describeError, isRecord } from '../common/errors';

export interface VaultConnection {
  address: string;
  token: string;
}

@Injectable()
export class VaultService {
  private readonly logger = new Logger(VaultService.name);
  private client: vault.client | null = null;

  constructor() {
    this.initializeClient({
      address: process.env.VAULT_ADDR ?? '',
      token: process.env.VAULT_TOKEN ?? '',
    });
  }

  get isConfigured(): boolean {
    return this.client !== null;
  }

  private initializeClient(connection: VaultConnection): void {
    if (!connection.address || !connection.token) {
      this.logger.warn('Vault credentials not found, skipping Vault initialization');
      return;
    }

    this.client = vault({
      apiVersion: 'v1',
      endpoint: connection.address,
      token: connection.token,
    });

    this.logger.log(`Vault client initialized for ${connection.address}`);
  }

  async readSecret(path: string): Promise<Record<string, unknown> | null> {
    if (!this.client) {
      this.logger.warn(`Vault client not initialized, cannot read secret: ${path}`);
      return null;
    }

    const fullPath = `secret/data/${path}`;
    try {
      const result: unknown = await this.client.read(fullPath);
      this.logger.log(`Successfully read secret from: ${fullPath}`);

      const payload = isRecord(result) && isRecord(result.data) ? result.data.data : null;
      return isRecord(payload) ? payload : null;
    } catch (error) {
      this.logger.error(`Failed to read secret from ${path}: ${describeError(error)}`);
      throw error;
    }
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client) {
      return false;
    }

    try {
      await this.client.health();
      return true;
    } catch (error) {
      this.logger.error(`Vault health check failed: ${describeError(error)}`);
      return false;
    }
  }
}
