import { JsonRpcRequest, JsonRpcResponse, RpcClient, RpcParams } from '@common/interfaces/rpc.interface';
import { ErrorHandler, RpcError, getErrorMessage } from '@common/utils/error-handler';
import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { RpcConnectionConfig } from '@types';

/**
 * A JSON-RPC 2.0 client for a Bitcoin Core node
 *
 * Every call is a single HTTP POST. Failures are not retried: transport errors,
 * non-2xx responses and a non-null `error` member all reject with an RpcError.
 */
export class JsonRpcClient implements RpcClient {
  private readonly logger = new Logger(JsonRpcClient.name);
  private readonly errorHandler = new ErrorHandler(JsonRpcClient.name);
  private readonly http: AxiosInstance;

  /**
   * @param config Connection settings
   * @param http Optional preconfigured axios instance; one is created from `config` otherwise
   */
  constructor(
    private readonly config: RpcConnectionConfig,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        timeout: config.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async call<T = unknown>(method: string, params: RpcParams = []): Promise<T> {
    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      method,
      params,
      id: this.config.clientId,
    };

    const startTime = Date.now();

    let response: JsonRpcResponse<T> | null;
    try {
      const httpResponse = await this.http.post<JsonRpcResponse<T> | null>(this.config.url, request, {
        timeout: this.config.timeoutMs,
        headers: this.authHeaders(),
      });
      response = httpResponse.data;
    } catch (error) {
      throw this.toRpcError(error, method, Date.now() - startTime);
    }

    this.logger.debug(`RPC call ${method} completed in ${Date.now() - startTime}ms`);

    if (typeof response !== 'object' || response === null) {
      throw this.errorHandler.handleRpcError('Malformed RPC response: body is not an object', this.config.url, method);
    }

    if (response.error) {
      throw this.errorHandler.handleRpcError(
        `RPC error: ${response.error.message} (code: ${response.error.code})`,
        this.config.url,
        method,
        { rpcCode: response.error.code },
      );
    }

    if (response.result === undefined) {
      throw this.errorHandler.handleRpcError('Malformed RPC response: missing result', this.config.url, method);
    }

    return response.result;
  }

  private authHeaders(): Record<string, string> {
    if (this.config.username === undefined || this.config.password === undefined) {
      return {};
    }
    const token = Buffer.from(`${this.config.username}:${this.config.password}`).toString('base64');
    return { Authorization: `Basic ${token}` };
  }

  /**
   * Bitcoin Core answers failed calls with HTTP 500 and a JSON-RPC body, so the
   * node's own error message is preferred over the status line when present.
   */
  private toRpcError(error: unknown, method: string, elapsedMs: number): RpcError {
    if (!axios.isAxiosError(error)) {
      return this.errorHandler.handleRpcError(getErrorMessage(error), this.config.url, method);
    }

    if (error.response) {
      const body: unknown = error.response.data;
      const rpcError = isJsonRpcErrorBody(body) ? body.error : null;
      if (rpcError) {
        return this.errorHandler.handleRpcError(
          `RPC error: ${rpcError.message} (code: ${rpcError.code})`,
          this.config.url,
          method,
          { rpcCode: rpcError.code, httpStatus: error.response.status },
        );
      }
      return this.errorHandler.handleRpcError(
        `HTTP error ${error.response.status}: ${error.response.statusText}`,
        this.config.url,
        method,
        { httpStatus: error.response.status },
      );
    }

    if (error.request) {
      return this.errorHandler.handleRpcError(
        `No response received (after ${elapsedMs}ms): ${error.message}`,
        this.config.url,
        method,
      );
    }

    return this.errorHandler.handleRpcError(error.message, this.config.url, method);
  }
}

function isJsonRpcErrorBody(body: unknown): body is { error: { code: number; message: string } } {
  if (typeof body !== 'object' || body === null || !('error' in body)) return false;
  const { error } = body;
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'code' in error &&
    typeof error.code === 'number'
  );
}
