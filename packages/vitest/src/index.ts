/**
 * @outbox-harness/vitest
 *
 * Vitest hooks for the outbox harness.
 *
 * @example
 * ```typescript
 * import { useOutboxConnector } from "@outbox-harness/vitest";
 *
 * useOutboxConnector();
 * ```
 */

export { resolveHookTimeout, useOutboxConnector } from "./use-outbox-connector";
export type { UseOutboxConnectorOptions } from "./use-outbox-connector";
