export { type Field, numberField, maxIn } from "./numeric";
export { type HyperDual, hyperDualField, constant, variable } from "./hyperDual";
export { erf, erfc, normCdf, normPdf, normCdfIn, normPdfIn } from "./normal";
export {
  priceCall,
  pricePut,
  price,
  greeks,
  callPriceIn,
  putPriceIn,
  priceIn,
  PER_POINT,
} from "./blackScholes";
export { adGreeks, portfolioGreeks } from "./adGreeks";
