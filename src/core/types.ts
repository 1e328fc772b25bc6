export enum RpcErrorCode {
    ParseError = -32700,
    InvalidRequest = -32600,
    MethodNotFound = -32601,
    InvalidParams = -32602,
    InternalError = -32603,
}

export type JSONRPCId = string | number;

export interface JSONRPCRequest {
    jsonrpc: '2.0';
    id?: JSONRPCId;
    method: string;
    params?: Record<string, unknown>;
}

export interface JSONRPCResponse {
    jsonrpc: '2.0';
    id: JSONRPCId | null;
    result?: unknown;
    error?: {
        code: number;
        message: string;
        data?: unknown;
    };
}

export interface ServerInfo {
    name: string;
    version: string;
}
