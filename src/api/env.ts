// ---------------------------------------------------------------------------
// Hono environment shared by the app, middleware and routes.
// ---------------------------------------------------------------------------

import type { Logger } from "../logging/logger.js";

export interface AppEnv {
  Variables: {
    requestId: string;
    logger: Logger;
  };
}
