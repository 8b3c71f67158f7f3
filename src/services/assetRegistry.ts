import type { AssetConfig, CollateralToken } from '../domain/types';
import { LengthMismatch, NotAllowedToken, UnknownAsset } from '../domain/errors';

interface RegisteredAsset {
  config: AssetConfig;
  token: CollateralToken;
}

// Accepted collateral, fixed at construction. Iteration follows registration order.
export class AssetRegistry {
  private readonly assets = new Map<string, RegisteredAsset>();

  constructor(assetIds: string[], priceSourceIds: string[], tokens: Record<string, CollateralToken>) {
    if (assetIds.length !== priceSourceIds.length) {
      throw new LengthMismatch(assetIds.length, priceSourceIds.length);
    }
    assetIds.forEach((assetId, i) => {
      const token = tokens[assetId];
      if (!token) throw new UnknownAsset(assetId);
      this.assets.set(assetId, {
        config: { assetId, priceSourceId: priceSourceIds[i], decimals: token.decimals },
        token,
      });
    });
  }

  get(assetId: string): AssetConfig {
    const entry = this.assets.get(assetId);
    if (!entry) throw new UnknownAsset(assetId);
    return entry.config;
  }

  // Same lookup, but phrased as a rejected deposit.
  requireAllowed(assetId: string): AssetConfig {
    const entry = this.assets.get(assetId);
    if (!entry) throw new NotAllowedToken(assetId);
    return entry.config;
  }

  token(assetId: string): CollateralToken {
    const entry = this.assets.get(assetId);
    if (!entry) throw new UnknownAsset(assetId);
    return entry.token;
  }

  list(): AssetConfig[] {
    return [...this.assets.values()].map((a) => a.config);
  }

  tokens(): CollateralToken[] {
    return [...this.assets.values()].map((a) => a.token);
  }
}
