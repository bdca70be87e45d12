// src/core/anomalyEngine.ts
import { EventEmitter } from "events";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { InputRecord, PresetCode } from "../types/marketEvents.js";
import type { AlertRecord, MlResult } from "../types/alertTypes.js";
import { decodeInput } from "../market/inputDecoder.js";
import type { OrderBookState } from "../market/orderBook.js";
import { createOrderBook, stepOrderBook } from "../market/orderBook.js";
import type { RollingStats } from "../indicators/rollingStatistics.js";
import {
    absorbEvent,
    createRollingStats,
    isWindowBoundary,
    rollWindow,
} from "../indicators/rollingStatistics.js";
import { evaluateRules } from "../indicators/ruleDetector.js";
import type {
    AdaptiveThresholdState,
    ThresholdMode,
} from "../indicators/adaptiveThresholds.js";
import {
    createAdaptiveThresholds,
    currentThresholds,
    stepAdaptiveThresholds,
} from "../indicators/adaptiveThresholds.js";
import type { PresetName, Thresholds } from "../indicators/thresholdPresets.js";
import {
    presetCode,
    presetName,
    presetThresholds,
} from "../indicators/thresholdPresets.js";
import type {
    FeatureExtractorState,
    FeatureVector,
} from "../indicators/featureExtractor.js";
import {
    createFeatureExtractor,
    stepFeatureExtractor,
} from "../indicators/featureExtractor.js";
import type { ModelWeights } from "../ml/modelWeights.js";
import type { InferencePipelineState } from "../ml/inferencePipeline.js";
import {
    createInferencePipeline,
    stepInferencePipeline,
} from "../ml/inferencePipeline.js";
import type { AlertSource, FusionState } from "../services/alertFusion.js";
import { createAlertFusion, stepAlertFusion } from "../services/alertFusion.js";
import type {
    CascadeAlert,
    CascadeObservation,
    CascadePattern,
    CascadeState,
} from "../services/cascadeDetector.js";
import {
    createCascadeDetector,
    stepCascadeDetector,
} from "../services/cascadeDetector.js";
import type {
    CircuitBreakerState,
    CircuitMode,
    CircuitTransition,
} from "../infrastructure/circuitBreaker.js";
import {
    createCircuitBreaker,
    policyFor,
    selectTrigger,
    stepCircuitBreaker,
} from "../infrastructure/circuitBreaker.js";

export interface EngineOptions {
    weights: ModelWeights;
    preset: PresetName;
    thresholdMode: ThresholdMode;
    volumeFloor: number;
    ruleConfidence: number;
}

/**
 * Every register of the engine. Nothing in here is mutated; a tick
 * builds a complete successor and swaps it in.
 */
export interface EngineState {
    readonly tick: number;
    readonly presetCode: PresetCode;
    readonly book: OrderBookState;
    readonly stats: RollingStats;
    readonly atu: AdaptiveThresholdState;
    readonly extractor: FeatureExtractorState;
    readonly ml: InferencePipelineState;
    readonly fusion: FusionState;
    readonly cascade: CascadeState;
    readonly breaker: CircuitBreakerState;
    readonly alertActive: boolean;
}

export interface OutputRecord {
    tick: number;
    alertActive: boolean;
    alertPriority: number;
    alertType: number;
    alertSource: AlertSource;
    alertBitmap: number;
    matchValid: boolean;
    matchPrice: number;
    featureValid: boolean;
    mlValid: boolean;
    mlClass: number;
    mlConfidence: number;
    cascade: CascadePattern | null;
    cbMode: CircuitMode;
    cbActive: boolean;
    cbCountdown: number;
    /** Preset whose thresholds judged this tick */
    preset: PresetName;
}

/** Side results of one tick, surfaced as engine events. */
export interface TickEffects {
    rule: AlertRecord;
    ml: MlResult;
    features: FeatureVector | null;
    cascade: CascadeAlert | null;
    transition: CircuitTransition | null;
    thresholds: Thresholds;
    orderDropped: boolean;
}

export function createEngineState(preset: PresetName = "NORMAL"): EngineState {
    return {
        tick: 0,
        presetCode: presetCode(preset),
        book: createOrderBook(),
        stats: createRollingStats(),
        atu: createAdaptiveThresholds(),
        extractor: createFeatureExtractor(),
        ml: createInferencePipeline(),
        fusion: createAlertFusion(),
        cascade: createCascadeDetector(),
        breaker: createCircuitBreaker(),
        alertActive: false,
    };
}

/**
 * One lock-step tick. Every component reads only the committed state of
 * the previous tick (and values produced earlier in this same tick's
 * combinational path); the returned state is the whole next register set.
 */
export function stepEngine(
    state: EngineState,
    input: InputRecord,
    options: Omit<EngineOptions, "preset">
): { state: EngineState; output: OutputRecord; effects: TickEffects } {
    const event = decodeInput(input);

    const book = stepOrderBook(state.book, event, policyFor(state.breaker));

    const thresholds = currentThresholds(
        state.atu,
        presetThresholds(state.presetCode),
        options.thresholdMode
    );
    const atu = stepAdaptiveThresholds(state.atu, event);

    const before = state.stats;
    const absorbed = absorbEvent(before, event, book.output.matchValid);
    const rule = evaluateRules(before, absorbed, event, thresholds, {
        volumeFloor: options.volumeFloor,
    });

    const extractor = stepFeatureExtractor(
        state.extractor,
        absorbed,
        isWindowBoundary(absorbed)
    );
    const stats = rollWindow(absorbed);

    const ml = stepInferencePipeline(
        state.ml,
        state.extractor.pending,
        options.weights
    );
    const fusion = stepAlertFusion(state.fusion, rule, ml.output);

    const observations: CascadeObservation[] = [];
    if (rule.winner !== null) {
        observations.push({
            anomaly: rule.winner,
            confidence: options.ruleConfidence,
        });
    }
    if (ml.output.valid && ml.output.className !== "NORMAL") {
        observations.push({
            anomaly: ml.output.className,
            confidence: ml.output.confidence,
        });
    }
    const cascade = stepCascadeDetector(state.cascade, observations);

    const breaker = stepCircuitBreaker(
        state.breaker,
        selectTrigger(cascade.output, rule, ml.output, options.ruleConfidence)
    );

    const next: EngineState = {
        tick: state.tick + 1,
        presetCode: event.kind === "config" ? event.preset : state.presetCode,
        book: book.state,
        stats,
        atu,
        extractor: extractor.state,
        ml: ml.state,
        fusion: fusion.state,
        cascade: cascade.state,
        breaker: breaker.state,
        alertActive: fusion.output.active,
    };

    return {
        state: next,
        output: {
            tick: state.tick,
            alertActive: fusion.output.active,
            alertPriority: fusion.output.priority,
            alertType: fusion.output.type,
            alertSource: fusion.output.source,
            alertBitmap: fusion.output.bitmap,
            matchValid: book.output.matchValid,
            matchPrice: book.output.matchPrice,
            featureValid: extractor.output.featureValid,
            mlValid: ml.output.valid,
            mlClass: ml.output.mlClass,
            mlConfidence: ml.output.confidence,
            cascade: cascade.output?.pattern ?? null,
            cbMode: breaker.state.mode,
            cbActive: breaker.state.active,
            cbCountdown: breaker.state.countdown,
            preset: presetName(state.presetCode),
        },
        effects: {
            rule,
            ml: ml.output,
            features: extractor.output.features,
            cascade: cascade.output,
            transition: breaker.transition,
            thresholds,
            orderDropped: book.output.orderDropped,
        },
    };
}

/**
 * Tick-synchronous anomaly detection and circuit-breaker engine.
 *
 * Emits:
 *  - "alert"   (OutputRecord, AlertRecord) when the fused alert rises
 *  - "match"   (OutputRecord) on every executed match
 *  - "ml"      (MlResult, tick) on every classifier result
 *  - "cascade" (CascadeAlert, tick)
 *  - "circuit" (CircuitTransition, tick) on every mode change
 */
export class AnomalyEngine extends EventEmitter {
    private state: EngineState;
    private readonly options: EngineOptions;
    private readonly logger: ILogger;

    constructor(options: EngineOptions, logger: ILogger) {
        super();
        this.options = options;
        this.logger = logger;
        this.state = createEngineState(options.preset);
        this.logger.info("[AnomalyEngine] Initialized", {
            preset: options.preset,
            thresholdMode: options.thresholdMode,
            volumeFloor: options.volumeFloor,
            ruleConfidence: options.ruleConfidence,
        });
    }

    public tick(input: InputRecord): OutputRecord {
        const wasActive = this.state.alertActive;
        const { state, output, effects } = stepEngine(
            this.state,
            input,
            this.options
        );
        this.state = state;
        this.publish(output, effects, wasActive);
        return output;
    }

    public run(inputs: Iterable<InputRecord>): OutputRecord[] {
        const outputs: OutputRecord[] = [];
        for (const input of inputs) outputs.push(this.tick(input));
        return outputs;
    }

    public snapshot(): Readonly<EngineState> {
        return this.state;
    }

    public reset(): void {
        this.state = createEngineState(this.options.preset);
        this.logger.info("[AnomalyEngine] Reset");
    }

    private publish(
        output: OutputRecord,
        effects: TickEffects,
        wasActive: boolean
    ): void {
        if (effects.orderDropped && this.logger.isDebugEnabled()) {
            this.logger.debug("[AnomalyEngine] Order dropped", {
                tick: output.tick,
                cbMode: output.cbMode,
            });
        }

        if (output.matchValid) {
            this.emit("match", output);
        }

        if (effects.ml.valid) {
            this.logger.info("[AnomalyEngine] Classifier result", {
                tick: output.tick,
                mlClass: effects.ml.className,
                confidence: effects.ml.confidence,
            });
            this.emit("ml", effects.ml, output.tick);
        }

        if (output.alertActive && !wasActive) {
            this.logger.warn("[AnomalyEngine] Alert raised", {
                tick: output.tick,
                priority: output.alertPriority,
                type: output.alertType,
                source: output.alertSource,
                bitmap: output.alertBitmap,
            });
            this.emit("alert", output, effects.rule);
        }

        if (effects.cascade !== null) {
            this.logger.warn("[AnomalyEngine] Cascade detected", {
                tick: output.tick,
                pattern: effects.cascade.pattern,
                precursors: effects.cascade.precursors,
                confidence: effects.cascade.confidence,
            });
            this.emit("cascade", effects.cascade, output.tick);
        }

        if (effects.transition !== null) {
            this.logger.info("[AnomalyEngine] Circuit breaker transition", {
                tick: output.tick,
                from: effects.transition.from,
                to: effects.transition.to,
                reason: effects.transition.reason,
                countdown: output.cbCountdown,
                trigger: effects.transition.trigger,
            });
            this.emit("circuit", effects.transition, output.tick);
        }
    }
}
