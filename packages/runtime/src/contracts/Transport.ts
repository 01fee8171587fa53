/**
 * @fileoverview Wire Transport Contract
 *
 * Text-frame connection to the controller application.
 *
 * @module @deckhost/runtime/contracts/Transport
 */

/**
 * Duplex text transport used by the event loop.
 *
 * `send` never waits: it returns false when the frame could not be handed
 * to the connection right now (not open, or too much data buffered), and
 * the caller keeps the frame for a later retry.
 */
export interface WireTransport {
    /**
     * Hand one text frame to the connection.
     *
     * @returns true if accepted
     */
    send(text: string): boolean;

    /**
     * Register the reader. Called once with every received text frame.
     */
    onMessage(listener: (text: string) => void): void;

    /**
     * Register a listener for close or error.
     */
    onClose(listener: (reason: string) => void): void;

    /**
     * Detach the reader. Frames received afterwards are ignored.
     */
    detach(): void;

    /** Close the connection */
    close(): void;
}
