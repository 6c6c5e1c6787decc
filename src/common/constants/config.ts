/**
 * Centralized configuration constants for the application
 */

// Bitcoin node constants
export const BITCOIN = {
  // RPC defaults
  RPC: {
    DEFAULT_HOST: '127.0.0.1',
    DEFAULT_PORT: 8332,
    DEFAULT_CLIENT_ID: 'difficulty-monitor',

    // RPC methods
    METHODS: {
      GET_BLOCK_COUNT: 'getblockcount',
      GET_BEST_BLOCK_HASH: 'getbestblockhash',
      GET_BLOCK_HASH: 'getblockhash',
      GET_BLOCK: 'getblock',
      GET_BLOCK_HEADER: 'getblockheader',
      GET_DIFFICULTY: 'getdifficulty',
      GET_MINING_INFO: 'getmininginfo',
      GET_BLOCKCHAIN_INFO: 'getblockchaininfo',
      GET_NETWORK_HASH_PS: 'getnetworkhashps',
      GET_BLOCK_TEMPLATE: 'getblocktemplate',
    },
  },

  // Block analysis
  BLOCKS: {
    // Upper bound for a single analysis window
    MAX_ANALYSIS_BLOCKS: 500,

    DEFAULT_RECENT_BLOCKS: 10,

    // Concurrent RPC calls per fetch batch, below Bitcoin Core's default RPC work queue (16)
    FETCH_BATCH_SIZE: 16,
  },
} as const;

// Feature flags
export const FEATURE_FLAGS = {
  ENABLE_DIFFICULTY_MONITORING: 'ENABLE_DIFFICULTY_MONITORING',
  LOG_TO_FILE: 'LOG_TO_FILE',
} as const;

// Environment variable names
export const ENV_VARS = {
  // General
  NODE_ENV: 'NODE_ENV',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_DIRECTORY: 'LOG_DIRECTORY',
  PORT: 'PORT',
  ENV_FILE: 'ENV_FILE',

  // Node connection
  RPC_URL: 'RPC_URL',
  RPC_HOST: 'RPC_HOST',
  RPC_PORT: 'RPC_PORT',
  RPC_USER: 'RPC_USER',
  RPC_PASSWORD: 'RPC_PASSWORD',
  RPC_TIMEOUT_MS: 'RPC_TIMEOUT_MS',
  RPC_CLIENT_ID: 'RPC_CLIENT_ID',

  // Monitoring configuration
  SCAN_INTERVAL: 'SCAN_INTERVAL',
  BLOCKS_TO_SCAN: 'BLOCKS_TO_SCAN',
} as const;

// Default values for configuration
export const DEFAULTS = {
  // General defaults
  PORT: 3000,
  NODE_ENV: 'development',
  LOG_LEVEL: 'info',
  LOG_DIRECTORY: 'logs',
  ENV_FILE: '.env',

  // Monitoring defaults
  SCAN_INTERVAL: 60, // seconds
  BLOCKS_TO_SCAN: 10,

  // Default timeouts
  REQUEST_TIMEOUT_MS: 10000,
} as const;
