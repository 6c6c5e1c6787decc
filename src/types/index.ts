// Bitcoin node types
export * from './bitcoin/block';
export * from './bitcoin/node';

// Analysis types
export * from './analysis/statistics';

// RPC types
export * from './rpc/connection';

// Monitoring types
export * from './monitoring/difficulty-monitoring';
