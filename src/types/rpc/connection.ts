/**
 * Connection settings for a node's JSON-RPC interface
 */
export interface RpcConnectionConfig {
  url: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  clientId: string;
}
