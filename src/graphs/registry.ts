import { z } from "zod";

/**
 * Attaches a reducer to a state field. Fields without one are replaced on
 * update; fields with one are combined as `merge(current, update)`.
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   messages: z.array(z.string()).register(STATE_MERGE, { merge: appendReducer }),
 * });
 * ```
 */
export const STATE_MERGE = z.registry<{ merge: (current: z.$output, update: z.$output) => z.$output }>();
