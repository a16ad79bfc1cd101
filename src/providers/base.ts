import type { AccessStatus, ContactProvider, ContactRecord } from '../types/index.js';
import { ProviderError } from '../utils/index.js';

/**
 * Base class for contact providers with common utility methods.
 */
export abstract class BaseProvider implements ContactProvider {
  abstract readonly name: string;
  abstract readonly type: ContactProvider['type'];

  protected config: Record<string, unknown>;

  constructor(config: Record<string, unknown> = {}) {
    this.config = config;
  }

  abstract requestAccess(): Promise<AccessStatus>;
  abstract fetchAll(): Promise<ContactRecord[]>;

  protected assertConfigured(field: string): string {
    const value = this.config[field];
    if (!value || typeof value !== 'string') {
      throw new ProviderError(this.name, `Missing required config: ${field}`);
    }
    return value;
  }
}
