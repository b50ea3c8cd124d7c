export { BucketLayout, floorLog2 } from "./bucket-layout.js";
export { Histogram, type HistogramOptions } from "./histogram.js";
