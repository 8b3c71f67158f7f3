import type { PriceQuote, PriceSource } from '../domain/types';
import { OracleUnavailable } from '../domain/errors';
import { USD_DECIMALS } from '../config/constants';
import { mulDiv, pow10, scaleDecimals } from '../utils/math';
import type { AssetRegistry } from './assetRegistry';

// Converts between asset amounts (native decimals) and 18-decimal USD.
// Each conversion reads exactly one quote.
export class PriceOracle {
  constructor(
    private readonly registry: AssetRegistry,
    private readonly source: PriceSource,
  ) {}

  usdValue(assetId: string, amount: bigint): bigint {
    const { decimals } = this.registry.get(assetId);
    const price = this.priceWad(assetId);
    return mulDiv(price, amount, pow10(decimals));
  }

  amountFromUsd(assetId: string, usdAmount: bigint): bigint {
    const { decimals } = this.registry.get(assetId);
    const price = this.priceWad(assetId);
    return mulDiv(usdAmount, pow10(decimals), price);
  }

  // USD per whole unit of the asset, rescaled to 18 decimals.
  priceWad(assetId: string): bigint {
    const { priceSourceId } = this.registry.get(assetId);
    const quote = this.fetch(assetId, priceSourceId);
    const price = scaleDecimals(quote.price, quote.decimals, USD_DECIMALS);
    if (price <= 0n) throw new OracleUnavailable(assetId, `non-positive price ${quote.price}`);
    return price;
  }

  private fetch(assetId: string, priceSourceId: string): PriceQuote {
    try {
      return this.source.latestPrice(priceSourceId);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new OracleUnavailable(assetId, reason);
    }
  }
}
