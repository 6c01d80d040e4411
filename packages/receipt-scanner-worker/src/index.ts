export * from "./batch/directory-scanner.js";
export * from "./client/api-client.js";
export * from "./config/env.js";
export * from "./export/csv.js";
export * from "./export/raw-log.js";
export * from "./processor/aggregation.js";
export * from "./processor/date-extractor.js";
export * from "./processor/date-normalizer.js";
export * from "./processor/heuristic-extractor.js";
export * from "./processor/language-classifier.js";
export * from "./processor/locale-profiles.js";
export * from "./processor/location-extractor.js";
export * from "./processor/normalization.js";
export * from "./processor/receipt-processor.js";
export * from "./processor/total-extractor.js";
export * from "./processor/types.js";
export * from "./processor/vendor-extractor.js";
export * from "./runner/worker-runner.js";
