export const ALPACA_DATA_URL = 'https://data.alpaca.markets';
export const ALPACA_PAPER_TRADING_URL = 'https://paper-api.alpaca.markets';

export const alpacaEndpoints = {
  bars: (symbol: string) => `/v2/stocks/${encodeURIComponent(symbol)}/bars`,
  clock: () => '/v2/clock'
};
