import type { StateStorageConfig } from '@stepwise/shared';
import { JsonStateStorage } from './json.storage.js';
import { SqliteStateStorage } from './sqlite.storage.js';
import type { StateStorage, StorageOptions } from './storage.types.js';

/** `location` is a directory for json and a database file for sqlite. */
export function createStorage(
  config: StateStorageConfig,
  location: string,
  options: StorageOptions = {},
): StateStorage {
  switch (config.type) {
    case 'json':
      return new JsonStateStorage(location, options);
    case 'sqlite':
      return new SqliteStateStorage({ databasePath: location, ...options });
  }
}
