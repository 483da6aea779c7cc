import 'dotenv/config';
import { resolveLogLevel } from './lib/logger.js';

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const cfg = {
  port: num(process.env.PORT, 3000),
  logLevel: resolveLogLevel(process.env.LOG_LEVEL),

  ebay: {
    // Finding API authenticates with the app id alone
    appId: process.env.EBAY_APP_ID || process.env.EBAY_CLIENT_ID || '',
    sandbox: (process.env.EBAY_ENV || 'production').toLowerCase() === 'sandbox',
  },

  searchApi: {
    key: process.env.SEARCHAPI_KEY || '',
  },

  vision: {
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.VISION_MODEL || 'gpt-4o-mini',
    timeoutMs: num(process.env.VISION_TIMEOUT_MS, 30000),
  },

  barcode: {
    timeoutMs: num(process.env.BARCODE_TIMEOUT_MS, 10000),
  },

  market: {
    cacheTtlHours: num(process.env.MARKET_CACHE_TTL_HOURS, 24),
    windowDays: num(process.env.MARKET_WINDOW_DAYS, 60),
    fallbackPrice: num(process.env.MARKET_FALLBACK_PRICE, 20),
    sourceTimeoutMs: num(process.env.MARKET_SOURCE_TIMEOUT_MS, 15000),
  },

  pricing: {
    floor: num(process.env.PRICE_FLOOR, 5),
    quickSaleFactor: num(process.env.QUICK_SALE_FACTOR, 0.85),
    finalValueFeeRate: num(process.env.FINAL_VALUE_FEE_RATE, 0.1325),
    perOrderFee: num(process.env.PER_ORDER_FEE, 0.3),
    shippingCost: num(process.env.SHIPPING_COST, 8.5),
  },
};

export type AppConfig = typeof cfg;
