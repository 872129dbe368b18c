/**
 * Telemetry gateway client
 * Recent sensor readings for one turbine model
 */

import { z } from 'zod';
import { TelemetryError } from '../errors.js';
import { logger } from '../logger.js';
import { fetchWithRetry } from '../utils/http.js';
import type { TelemetryGateway } from '../pipeline/collaborators.js';
import type { TelemetryReading } from '../pipeline/state.js';

const ReadingSchema = z.object({
    timestamp: z.string(),
    variable: z.string(),
    value: z.number().finite(),
    unit: z.string().optional(),
});

const ReadingsResponseSchema = z.union([
    z.array(z.unknown()),
    z.object({ readings: z.array(z.unknown()) }).transform((body) => body.readings),
    z.object({ data_points: z.array(z.unknown()) }).transform((body) => body.data_points),
]);

export interface TelemetryClientOptions {
    endpoint: string;
    apiKey?: string;
    timeoutMs: number;
}

/** Keep the readings that validate, drop the rest */
export function parseReadings(body: unknown): { readings: TelemetryReading[]; dropped: number } {
    const parsed = ReadingsResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new TelemetryError('Unexpected telemetry response');
    }

    const readings: TelemetryReading[] = [];
    let dropped = 0;
    for (const entry of parsed.data) {
        const reading = ReadingSchema.safeParse(entry);
        if (reading.success) {
            readings.push(reading.data);
        } else {
            dropped++;
        }
    }
    return { readings, dropped };
}

export class TelemetryClient implements TelemetryGateway {
    constructor(private options: TelemetryClientOptions) {
        if (!options.endpoint || options.endpoint.trim() === '') {
            throw new TelemetryError('TELEMETRY_ENDPOINT is required');
        }
    }

    async fetch(turbineModel: string, variables: string[], lookbackMinutes: number): Promise<TelemetryReading[]> {
        const reply = await fetchWithRetry(this.options.endpoint, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                ...(this.options.apiKey ? { 'x-api-key': this.options.apiKey } : {}),
            },
            body: JSON.stringify({
                turbine_model: turbineModel,
                variables,
                lookback_minutes: lookbackMinutes,
            }),
        }, { retries: 1, timeoutMs: this.options.timeoutMs });

        if (!reply.ok) {
            throw new TelemetryError(`Telemetry API error: ${reply.status} - ${reply.message}`, reply.status);
        }

        const { readings, dropped } = parseReadings(reply.data);
        if (dropped > 0) {
            logger.warn(`Dropped ${dropped} malformed telemetry reading(s) for ${turbineModel}`);
        }
        return readings;
    }
}
