/**
 * @fileoverview Unit tests for WebSocketTransport
 *
 * Uses an in-process `ws` server on a loopback port.
 *
 * Tests cover:
 * - Connecting, sending and receiving text frames
 * - Binary frames are ignored
 * - Close reporting and send after close
 *
 * @module @deckhost/runtime/__tests__/WebSocketTransport
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { WebSocketTransport } from "../transport/WebSocketTransport.js";
import { createMockLogger } from "./fixtures.js";

describe("WebSocketTransport", () => {
    let server: WebSocketServer;
    let url: string;
    let peer: Promise<WebSocket>;

    beforeEach(async () => {
        server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
        peer = new Promise((resolve) => server.once("connection", resolve));
        await new Promise<void>((resolve) => server.once("listening", () => resolve()));

        const address = server.address();
        const port = typeof address === "object" && address !== null ? address.port : 0;
        url = `ws://127.0.0.1:${port}`;
    });

    afterEach(async () => {
        for (const client of server.clients) {
            client.terminate();
        }
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    // Scenario: frames flow both ways
    it("should send and receive text frames", async () => {
        const transport = await WebSocketTransport.connect(url);
        const socket = await peer;

        const received = new Promise<string>((resolve) => socket.once("message", (data) => resolve(String(data))));
        expect(transport.send("{\"event\":\"registerPlugin\"}")).toBe(true);
        expect(await received).toBe("{\"event\":\"registerPlugin\"}");

        const listener = vi.fn();
        transport.onMessage(listener);
        socket.send("{\"event\":\"systemDidWakeUp\"}");
        await vi.waitFor(() => {
            expect(listener).toHaveBeenCalledWith("{\"event\":\"systemDidWakeUp\"}");
        });

        transport.close();
    });

    // Scenario: binary frames are dropped with a warning
    it("should ignore binary frames", async () => {
        const logger = createMockLogger();
        const transport = await WebSocketTransport.connect(url, { logger });
        const socket = await peer;
        const listener = vi.fn();
        transport.onMessage(listener);

        socket.send(Buffer.from([1, 2, 3]), { binary: true });
        await vi.waitFor(() => {
            expect(logger.warn).toHaveBeenCalledWith("Ignoring binary frame");
        });

        expect(listener).not.toHaveBeenCalled();
        transport.close();
    });

    // Scenario: the peer closes the connection
    it("should report close and refuse further sends", async () => {
        const transport = await WebSocketTransport.connect(url);
        const socket = await peer;
        const onClose = vi.fn();
        transport.onClose(onClose);

        socket.close(1000, "bye");
        await vi.waitFor(() => {
            expect(onClose).toHaveBeenCalledWith("closed (1000) bye");
        });

        expect(transport.send("{}")).toBe(false);

        const late = vi.fn();
        transport.onClose(late);
        expect(late).toHaveBeenCalledWith("closed (1000) bye");
    });

    // Scenario: nothing is listening
    it("should reject when the connection fails", async () => {
        await expect(WebSocketTransport.connect("ws://127.0.0.1:1", { handshakeTimeoutMs: 500 })).rejects.toThrow();
    });
});
