/**
 * @fileoverview Runtime Context
 *
 * The handle passed to every action hook, adapter and app hook.
 *
 * @module @deckhost/runtime/context/Context
 */

import type { Bus } from "../contracts/Bus.js";
import type { RuntimeLogger } from "../contracts/Logger.js";
import { DeckClient } from "../protocol/DeckClient.js";
import { Extensions } from "./Extensions.js";
import { GlobalSettings } from "./GlobalSettings.js";

export interface ContextOptions {
    readonly bus: Bus;
    readonly pluginUuid: string;
    readonly logger: RuntimeLogger;
    readonly extensions?: Extensions;
}

export class Context {
    /** Typed client for the controller application */
    readonly deck: DeckClient;

    /** Producer side of the runtime queue */
    readonly bus: Bus;

    /** Push-on-write plugin-wide settings */
    readonly globals: GlobalSettings;

    /** Plugin-provided shared state */
    readonly extensions: Extensions;

    readonly pluginUuid: string;
    readonly logger: RuntimeLogger;

    constructor(options: ContextOptions) {
        this.bus = options.bus;
        this.pluginUuid = options.pluginUuid;
        this.logger = options.logger;
        this.extensions = options.extensions ?? new Extensions();
        this.deck = new DeckClient(options.bus, options.pluginUuid);
        this.globals = new GlobalSettings(this.deck, options.logger);
    }
}
