/**
 * Commands Module - Schemas and Types
 *
 * Operator override commands delivered through the one-shot command slot.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import type { ControllerState } from "../controller/schema.js";

// =============================================================================
// Override Commands
// =============================================================================

/**
 * Override command as accepted by the status API.
 */
export const OverrideCommandSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("stop") }),
  z.object({ command: z.literal("normal") }),
  z.object({ command: z.literal("pump_now") }),
  z.object({
    command: z.literal("wait"),
    minutes: z.number().int().positive().describe("Override OFF time"),
  }),
]);

export type OverrideCommand = z.infer<typeof OverrideCommandSchema>;

export type OverrideCommandName = OverrideCommand["command"];

// =============================================================================
// Applying Commands
// =============================================================================

/**
 * Result of applying a command to controller state.
 */
export type OverrideEffect = Readonly<{
  state: ControllerState;
  /** Stop the controller at the next poll boundary */
  stopRequested: boolean;
  /** End the current OFF wait early */
  pumpNow: boolean;
  /** Log line describing what changed */
  description: string;
}>;
