import { OpaqueTokenStore } from "./opaqueTokenStore";
import { RefreshTokenStore } from "./refreshTokenStore";

type CleanupSummary = {
  refreshTokens: number;
  opaqueTokens: number;
};

/**
 * Deletes expired rows from both token collections. Expiry is already
 * enforced at validation time; this only keeps the collections small.
 */
export async function cleanupExpiredTokens(
  refreshTokens: RefreshTokenStore,
  opaqueTokens: OpaqueTokenStore
): Promise<CleanupSummary> {
  const [refreshCount, opaqueCount] = await Promise.all([
    refreshTokens.cleanupExpired(),
    opaqueTokens.cleanupExpired(),
  ]);
  const summary = { refreshTokens: refreshCount, opaqueTokens: opaqueCount };
  console.info("Expired tokens removed", summary);
  return summary;
}
