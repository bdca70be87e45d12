// src/core/dependencies.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { Logger } from "../infrastructure/logger.js";
import type { ModelWeights } from "../ml/modelWeights.js";
import { loadModelWeights } from "../ml/modelWeights.js";
import { AnomalyEngine } from "./anomalyEngine.js";
import type { EngineConfig } from "./config.js";

/**
 * Everything a running engine needs, wired once at startup.
 */
export interface Dependencies {
    config: EngineConfig;
    logger: ILogger;
    weights: ModelWeights;
    engine: AnomalyEngine;
}

/**
 * Build the engine from validated configuration. Weight files are read
 * here, before the first tick; a bad model directory fails startup.
 */
export function createDependencies(
    config: EngineConfig,
    logger: ILogger = new Logger(config.prettyLogs, config.logLevel),
    weights: ModelWeights = loadModelWeights(config.modelDir)
): Dependencies {
    logger.info("[Dependencies] Model weights loaded", {
        modelDir: config.modelDir,
    });

    const engine = new AnomalyEngine(
        {
            weights,
            preset: config.preset,
            thresholdMode: config.thresholdMode,
            volumeFloor: config.volumeFloor,
            ruleConfidence: config.ruleConfidence,
        },
        logger
    );

    return { config, logger, weights, engine };
}
