import { WebSocket, type RawData } from 'ws';

/**
 * Callbacks a connection reports into
 */
export interface FeedConnectionHandlers {
    onOpen(): void;
    onMessage(data: string): void;
    onClose(code: number, reason: string): void;
    onError(error: Error): void;
}

/**
 * One live transport to the feed
 */
export interface FeedConnection {
    send(payload: string): void;
    close(): void;
    isOpen(): boolean;
}

/**
 * Opens a connection. May throw synchronously (bad URL); later failures arrive
 * through `onError` followed by `onClose`.
 */
export type FeedConnector = (url: string, handlers: FeedConnectionHandlers) => FeedConnection;

export interface WsConnectorOptions {
    pingIntervalMs: number;
    handshakeTimeoutMs: number;
}

const textDecoder = new TextDecoder();

/**
 * Frames arrive as a Buffer, a fragment list or an ArrayBuffer depending on binaryType
 */
export function rawDataToString(data: RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf-8');
    }
    if (data instanceof ArrayBuffer) {
        return textDecoder.decode(data);
    }
    return data.toString('utf-8');
}

/**
 * Connector over the `ws` package with a client-side ping keepalive
 */
export function createWsConnector(options: WsConnectorOptions): FeedConnector {
    return (url, handlers) => {
        const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs });
        let pingTimer: NodeJS.Timeout | null = null;

        const clearPing = () => {
            if (pingTimer) {
                clearInterval(pingTimer);
                pingTimer = null;
            }
        };

        socket.on('open', () => {
            pingTimer = setInterval(() => {
                if (socket.readyState === WebSocket.OPEN) {
                    socket.ping();
                }
            }, options.pingIntervalMs);
            handlers.onOpen();
        });

        socket.on('message', (data: RawData) => {
            handlers.onMessage(rawDataToString(data));
        });

        socket.on('error', (error: Error) => {
            handlers.onError(error);
        });

        socket.on('close', (code: number, reason: Buffer) => {
            clearPing();
            handlers.onClose(code, reason.toString('utf-8'));
        });

        return {
            send: (payload: string) => socket.send(payload),
            close: () => {
                clearPing();
                socket.close();
            },
            isOpen: () => socket.readyState === WebSocket.OPEN,
        };
    };
}
