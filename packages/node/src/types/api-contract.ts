/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ParticipantId } from "@trustnet/types";
import type { NetworkService } from "../services/network-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the trustnet node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The network every request operates on */
    service: NetworkService;

    /** Who is calling, and who co-signed (set by auth middleware) */
    auth: AuthContext;

    /** Shorthand for auth.participantId */
    caller: ParticipantId;
  };
}
