/**
 * Positional (array) or named (object) JSON-RPC parameters
 */
export type RpcParams = unknown[] | Record<string, unknown>;

/**
 * Anything that can forward a method call to a node
 */
export interface RpcClient {
  /**
   * Issue a call and return the decoded `result` member.
   * Rejects with an RpcError on transport or protocol failure.
   */
  call<T = unknown>(method: string, params?: RpcParams): Promise<T>;
}

/**
 * Injection token for the RpcClient used by the node-facing services
 */
export const RPC_CLIENT = Symbol('RPC_CLIENT');

/**
 * RPC method request payload
 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params: RpcParams;
  id: number | string;
}

/**
 * RPC method response
 */
export interface JsonRpcResponse<T = unknown> {
  jsonrpc?: string;
  id: number | string | null;
  result?: T;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  } | null;
}
