export * from "./types";
export {
  cappedCallPayoff,
  participationPayoff,
  spreadPayoff,
  triggerPayoff,
  bufferPayoff,
  floorPayoff,
  bufferWithFloorPayoff,
  stepRateBufferPayoff,
  type CapFloorOptions,
  type TriggerOptions,
} from "./construct";
export { calculate, calculateIn } from "./calculate";
export { creditBounds } from "./bounds";
