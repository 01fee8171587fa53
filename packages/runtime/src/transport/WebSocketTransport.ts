/**
 * @fileoverview WebSocket Transport
 *
 * {@link WireTransport} over a `ws` client socket. Pings are answered by
 * `ws` itself; binary frames are ignored.
 *
 * @module @deckhost/runtime/transport/WebSocketTransport
 */

import WebSocket from "ws";
import type { RuntimeLogger } from "../contracts/Logger.js";
import type { WireTransport } from "../contracts/Transport.js";

export interface WebSocketTransportOptions {
    /** `send` reports false while more than this many bytes are queued (default: 1 MiB) */
    readonly highWaterMark?: number;

    /** Give up connecting after this many milliseconds (default: 10000) */
    readonly handshakeTimeoutMs?: number;

    readonly logger?: RuntimeLogger;
}

function rawDataToText(data: WebSocket.RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString("utf8");
    }
    if (Buffer.isBuffer(data)) {
        return data.toString("utf8");
    }
    return Buffer.from(data).toString("utf8");
}

export class WebSocketTransport implements WireTransport {
    private messageListener: ((text: string) => void) | undefined;
    private readonly closeListeners: ((reason: string) => void)[] = [];
    private closeReason: string | undefined;
    private readonly highWaterMark: number;
    private readonly logger?: RuntimeLogger;

    constructor(
        private readonly socket: WebSocket,
        options: WebSocketTransportOptions = {},
    ) {
        this.highWaterMark = options.highWaterMark ?? 1024 * 1024;
        this.logger = options.logger;

        socket.on("message", (data, isBinary) => {
            if (isBinary) {
                this.logger?.warn("Ignoring binary frame");
                return;
            }
            this.messageListener?.(rawDataToText(data));
        });
        socket.on("close", (code, reason) => {
            this.reportClose(`closed (${code}) ${reason.toString("utf8")}`.trim());
        });
        socket.on("error", (error) => {
            this.reportClose(`error: ${error.message}`);
        });
    }

    /**
     * Open a connection and resolve once it is ready.
     *
     * @throws Error if the connection cannot be established
     */
    static connect(url: string, options: WebSocketTransportOptions = {}): Promise<WebSocketTransport> {
        return new Promise((resolve, reject) => {
            const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs ?? 10000 });

            const onError = (error: Error): void => {
                socket.off("open", onOpen);
                reject(error);
            };
            const onOpen = (): void => {
                socket.off("error", onError);
                resolve(new WebSocketTransport(socket, options));
            };

            socket.once("open", onOpen);
            socket.once("error", onError);
        });
    }

    send(text: string): boolean {
        if (this.socket.readyState !== WebSocket.OPEN || this.socket.bufferedAmount > this.highWaterMark) {
            return false;
        }
        this.socket.send(text);
        return true;
    }

    onMessage(listener: (text: string) => void): void {
        this.messageListener = listener;
    }

    onClose(listener: (reason: string) => void): void {
        if (this.closeReason !== undefined) {
            listener(this.closeReason);
            return;
        }
        this.closeListeners.push(listener);
    }

    detach(): void {
        this.messageListener = undefined;
    }

    close(): void {
        if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
            this.socket.close(1000);
        }
    }

    private reportClose(reason: string): void {
        if (this.closeReason !== undefined) {
            return;
        }
        this.closeReason = reason;
        for (const listener of this.closeListeners.splice(0)) {
            listener(reason);
        }
    }
}
