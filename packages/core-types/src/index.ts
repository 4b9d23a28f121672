export type OptionVariant = 'call' | 'put';

export type DayCount = 'ACT365' | 'Y365_25' | 'TRADING_252';

export interface OptionParameters {
  readonly spot: number;
  readonly strike: number;
  readonly timeToExpiry: number;  // years
  readonly riskFreeRate: number;  // decimal, continuously compounded
  readonly volatility: number;    // annualized, decimal
  readonly variant: OptionVariant;
}

/** Parameters shared by both variants; used when pricing a call/put pair. */
export type MarketParameters = Omit<OptionParameters, 'variant'>;

export interface GreeksResult {
  price: number;
  delta: number;
  gamma: number;
  theta: number;  // per year
  vega: number;   // per 1.00 of volatility
  rho: number;    // per 1.00 of rate
}

export interface OptionPair<T> {
  call: T;
  put: T;
}

export interface AxisRange {
  min: number;
  max: number;
}

export interface GridRequest {
  strike: number;
  timeToExpiry: number;
  riskFreeRate: number;
  spotRange: AxisRange;
  volatilityRange: AxisRange;
  gridResolution?: number;
  callPurchasePrice: number;
  putPurchasePrice: number;
}

export interface SensitivityGrid {
  variant: OptionVariant;
  purchasePrice: number;
  spotAxis: number[];
  volatilityAxis: number[];
  /** profitMatrix[spotIndex][volatilityIndex] = price - purchasePrice */
  profitMatrix: number[][];
}

export interface GridResult {
  callGrid: SensitivityGrid;
  putGrid: SensitivityGrid;
}

export type LookbackPeriod = '6mo' | '1y' | '2y' | '5y' | '10y' | 'ytd';

export type InputSource = 'market' | 'fallback';

export interface MarketInputs {
  ticker: string;
  period: LookbackPeriod;
  currentPrice: number;
  historicalVolatility: number;
  riskFreeRate: number;
  sources: {
    currentPrice: InputSource;
    historicalVolatility: InputSource;
    riskFreeRate: InputSource;
  };
  warnings: string[];
}
