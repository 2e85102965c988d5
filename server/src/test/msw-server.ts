import { setupServer } from "msw/node";

import { makeHandlers, PAYMENT_BASE_URL } from "./msw-handlers.js";

export const mswServer = setupServer(...makeHandlers(PAYMENT_BASE_URL));
