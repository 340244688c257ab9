/**
 * Shared contracts for clusterwatch
 *
 * Wire contracts of the systems the services talk to. Services import the
 * schemas and inferred types from here instead of defining local duplicates.
 */

export * from './search-cluster/index.js';
