import type { CatalogRepository } from '../catalog/repository';
import { ADMIN_STORE_ID } from '../catalog/types';

export const ADMIN_STORE_CODE = 'admin';

export interface StoreResolver {
  /** Store id for a code, or null when no such store exists */
  resolve(storeCode: string): number | null;
}

/**
 * Lazily resolves store codes for one import run. Misses are cached too;
 * nothing is invalidated until the run ends.
 */
export function createStoreResolver(repository: Pick<CatalogRepository, 'getStoreIdByCode'>): StoreResolver {
  const cache = new Map<string, number | null>();

  return {
    resolve(storeCode: string): number | null {
      if (storeCode === ADMIN_STORE_CODE) return ADMIN_STORE_ID;
      const cached = cache.get(storeCode);
      if (cached !== undefined) return cached;
      const storeId = repository.getStoreIdByCode(storeCode) ?? null;
      cache.set(storeCode, storeId);
      return storeId;
    },
  };
}
