// src/index.ts
export { AnomalyEngine, createEngineState, stepEngine } from "./core/anomalyEngine.js";
export type {
    EngineOptions,
    EngineState,
    OutputRecord,
    TickEffects,
} from "./core/anomalyEngine.js";
export { EngineConfigSchema, loadConfig, parseConfig } from "./core/config.js";
export type { EngineConfig } from "./core/config.js";
export { createDependencies } from "./core/dependencies.js";
export type { Dependencies } from "./core/dependencies.js";
export { ConfigValidationError, ModelWeightsError } from "./core/errors.js";

export {
    decodeInput,
    decodeInputWord,
    encodeInputWord,
    formatInputWord,
    parseInputWord,
    parseStimulus,
} from "./market/inputDecoder.js";
export type { InputWord } from "./market/inputDecoder.js";
export { BOOK_DEPTH, createOrderBook, stepOrderBook } from "./market/orderBook.js";
export type { BookPolicy, OrderBookState } from "./market/orderBook.js";

export { THRESHOLD_PRESETS, PRESET_NAMES } from "./indicators/thresholdPresets.js";
export type { PresetName, Thresholds } from "./indicators/thresholdPresets.js";
export type { ThresholdMode } from "./indicators/adaptiveThresholds.js";
export type { FeatureVector } from "./indicators/featureExtractor.js";

export {
    createModelWeights,
    loadModelWeights,
    parseHexWords,
} from "./ml/modelWeights.js";
export type { ModelWeights } from "./ml/modelWeights.js";

export type { CascadeAlert, CascadePattern } from "./services/cascadeDetector.js";
export type { AlertSource } from "./services/alertFusion.js";
export { CircuitMode } from "./infrastructure/circuitBreaker.js";
export type { CircuitTransition } from "./infrastructure/circuitBreaker.js";

export { Logger } from "./infrastructure/logger.js";
export type { ILogger, LogLevel } from "./infrastructure/loggerInterface.js";

export { DETECTOR_KINDS, ML_CLASSES } from "./types/alertTypes.js";
export type { AlertRecord, AnomalyKind, MlResult } from "./types/alertTypes.js";
export type { InputRecord, MarketEvent } from "./types/marketEvents.js";
