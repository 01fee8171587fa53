/**
 * @fileoverview Addressing Targets
 *
 * Selectors deciding which live action instances or running adapters
 * receive a notification or a lifecycle command.
 *
 * @module @deckhost/runtime/contracts/Targets
 */

/**
 * How and when an adapter is started and stopped.
 *
 * - `eager`: started when the runtime starts, stopped when it ends
 * - `onAppLaunch`: started when the first tracked application launches,
 *   stopped (debounced) after the last one terminates
 * - `manual`: only started by an explicit control command
 */
export type StartPolicy = "eager" | "onAppLaunch" | "manual";

export const START_POLICIES: readonly StartPolicy[] = ["eager", "onAppLaunch", "manual"];

export function isStartPolicy(value: unknown): value is StartPolicy {
    return START_POLICIES.some((policy) => policy === value);
}

/**
 * Addressing for action notifications.
 */
export type ActionTarget =
    | { readonly kind: "all" }
    | { readonly kind: "context"; readonly context: string }
    | { readonly kind: "id"; readonly actionId: string };

export const ActionTarget = {
    /** Every live instance */
    all: (): ActionTarget => ({ kind: "all" }),

    /** The single instance bound to a tile context */
    context: (context: string): ActionTarget => ({ kind: "context", context }),

    /** Every live instance of an action type */
    id: (actionId: string): ActionTarget => ({ kind: "id", actionId }),
} as const;

/**
 * Addressing for adapter notifications and lifecycle commands.
 */
export type AdapterTarget =
    | { readonly kind: "all" }
    | { readonly kind: "policy"; readonly policy: StartPolicy }
    | { readonly kind: "name"; readonly name: string }
    | { readonly kind: "label"; readonly label: string };

export const AdapterTarget = {
    all   : (): AdapterTarget => ({ kind: "all" }),
    policy: (policy: StartPolicy): AdapterTarget => ({ kind: "policy", policy }),
    name  : (name: string): AdapterTarget => ({ kind: "name", name }),
    label : (label: string): AdapterTarget => ({ kind: "label", label }),
} as const;

/**
 * Lifecycle command for adapters.
 */
export interface AdapterControl {
    readonly op: "start" | "stop" | "restart";
    readonly target: AdapterTarget;
}

/**
 * Render a target for log lines.
 */
export function describeTarget(target: ActionTarget | AdapterTarget): string {
    switch (target.kind) {
        case "all":
            return "all";
        case "context":
            return `context:${target.context}`;
        case "id":
            return `id:${target.actionId}`;
        case "policy":
            return `policy:${target.policy}`;
        case "name":
            return `name:${target.name}`;
        case "label":
            return `label:${target.label}`;
    }
}
