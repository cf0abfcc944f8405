/**
 * chatport - State Domain
 */

export {
  diffKeyed,
  findDuplicateKey,
  createKeyedStore,
  type KeyedDiff,
  type KeyedStateHooks,
  type KeyedStoreHooks,
  type KeyedStore,
} from "./keyed";
