/**
 * Storage module exports
 */

export { BundleStore, type BundleStoreOptions, type SnapshotResult } from "./bundle-store";
export { findRepositoryDirectories, openBundleStore, type RepositoryDirectory } from "./catalog";
