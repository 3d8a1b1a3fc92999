/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createWalletRoutes } from "./wallets.js";
export { createTokenRoutes } from "./token.js";
export { createTransferRoutes } from "./transfers.js";
export { createSnapshotRoutes } from "./snapshot.js";
