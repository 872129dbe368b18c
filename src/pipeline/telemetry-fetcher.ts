import type { TelemetryConfig } from '../config.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { TelemetryGateway } from './collaborators.js';
import { stageResult, type AgentState, type PipelineStage, type StageResult } from './state.js';

/**
 * Pulls recent sensor readings for the detected turbine model. Never
 * throws: a gateway failure degrades to no data and a diagnostic.
 */
export class TelemetryFetcher implements PipelineStage {
    readonly name = 'telemetry-fetcher';

    constructor(
        private config: TelemetryConfig,
        private gateway: TelemetryGateway | null
    ) { }

    async run(state: Readonly<AgentState>): Promise<StageResult> {
        if (!this.config.enabled || !this.gateway) {
            return stageResult({ dataFetchStatus: 'disabled', dataPoints: [] });
        }

        if (!state.turbineModel) {
            logger.debug('Telemetry skipped: no turbine model detected');
            return stageResult({ dataFetchStatus: 'skipped', dataPoints: [] });
        }

        try {
            const dataPoints = await this.gateway.fetch(
                state.turbineModel,
                this.config.variables,
                this.config.lookbackMinutes
            );
            logger.debug(`Telemetry returned ${dataPoints.length} reading(s) for ${state.turbineModel}`);
            return stageResult({ dataFetchStatus: 'ok', dataPoints });
        } catch (error) {
            const message = describeError(error);
            logger.warn(`Telemetry fetch failed for ${state.turbineModel}: ${message}`);
            return stageResult(
                { dataFetchStatus: 'error', dataPoints: [] },
                [`Telemetry fetch failed: ${message}`]
            );
        }
    }
}
