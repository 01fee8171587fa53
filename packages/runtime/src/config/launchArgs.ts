/**
 * @fileoverview Launch Arguments
 *
 * The controller application starts the plugin process with
 * `-port <n> -pluginUUID <id> -registerEvent <name>` (plus flags the
 * runtime ignores).
 *
 * @module @deckhost/runtime/config/launchArgs
 */

import { LaunchArgError } from "./errors.js";

export interface LaunchArgs {
    readonly port: number;
    readonly pluginUuid: string;
    readonly registerEvent: string;
}

const MAX_PORT = 65535;

/**
 * Parse launch flags.
 *
 * @param argv - Arguments after the script path (default: `process.argv.slice(2)`)
 * @throws LaunchArgError if a required flag is missing or the port is invalid
 *
 * @example
 * ```typescript
 * parseLaunchArgs(["-port", "28196", "-pluginUUID", "ABC", "-registerEvent", "registerPlugin"]);
 * // { port: 28196, pluginUuid: "ABC", registerEvent: "registerPlugin" }
 * ```
 */
export function parseLaunchArgs(argv: readonly string[] = process.argv.slice(2)): LaunchArgs {
    const portText = valueAfter(argv, "-port");
    if (portText === undefined) {
        throw new LaunchArgError("missingPort", "missing -port");
    }

    const pluginUuid = valueAfter(argv, "-pluginUUID");
    if (pluginUuid === undefined) {
        throw new LaunchArgError("missingPluginUuid", "missing -pluginUUID");
    }

    const registerEvent = valueAfter(argv, "-registerEvent");
    if (registerEvent === undefined) {
        throw new LaunchArgError("missingRegisterEvent", "missing -registerEvent");
    }

    const port = /^\d+$/.test(portText) ? Number(portText) : Number.NaN;
    if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) {
        throw new LaunchArgError("invalidPort", `invalid port '${portText}'`);
    }

    return { port, pluginUuid, registerEvent };
}

/**
 * Build the WebSocket URL of the controller application.
 *
 * `DECK_WS_SCHEME` (default "ws") and `DECK_WS_HOST` (default "127.0.0.1")
 * override the defaults when set to a non-empty value.
 */
export function wsUrl(port: number, env: NodeJS.ProcessEnv = process.env): string {
    const scheme = env.DECK_WS_SCHEME || "ws";
    const host = env.DECK_WS_HOST || "127.0.0.1";
    return `${scheme}://${host}:${port}`;
}

function valueAfter(argv: readonly string[], flag: string): string | undefined {
    const index = argv.indexOf(flag);
    return index >= 0 ? argv[index + 1] : undefined;
}
