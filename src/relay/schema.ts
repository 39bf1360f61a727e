/**
 * Relay Module - Schemas and Types
 *
 * Defines the data shapes for the pump relay plug (setRelayStatus endpoint).
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Relay Configuration
// =============================================================================

export const RelayConfigSchema = z.object({
  host: z.string().min(1).describe("Relay plug host or IP"),
  timeoutMs: z.number().positive().describe("Per-request timeout in ms"),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

// =============================================================================
// Relay Commands
// =============================================================================

/**
 * Relay action as sent on the wire.
 */
export type RelayAction = "on" | "off";

/**
 * Request body for setRelayStatus.
 */
export type RelayCommandRequest = Readonly<{ data: RelayAction }>;

/**
 * Response from setRelayStatus / getPowerMeterData.
 * Only `rslt` matters for relay commands: "OK" means confirmed.
 */
export const RelayResponseSchema = z
  .object({
    rslt: z.string(),
  })
  .passthrough();

export type RelayResponse = z.infer<typeof RelayResponseSchema>;
