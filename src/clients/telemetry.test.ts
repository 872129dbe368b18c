import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TelemetryClient, parseReadings } from './telemetry.js';

const mockFetch = vi.fn();
global.fetch = mockFetch;

describe('parseReadings', () => {
    it('accepts a bare array and drops invalid entries', () => {
        const result = parseReadings([
            { timestamp: '2026-01-01T00:00:00Z', variable: 'oil_pressure', value: 42.5, unit: 'psi' },
            { timestamp: '2026-01-01T00:00:00Z', variable: 'vibration', value: 'high' },
            { variable: 'shaft_speed', value: 9000 },
        ]);

        expect(result).toEqual({
            readings: [{ timestamp: '2026-01-01T00:00:00Z', variable: 'oil_pressure', value: 42.5, unit: 'psi' }],
            dropped: 2,
        });
    });

    it('accepts a readings envelope', () => {
        const result = parseReadings({ readings: [{ timestamp: 't', variable: 'vibration', value: 0.2 }] });
        expect(result.readings).toEqual([{ timestamp: 't', variable: 'vibration', value: 0.2 }]);
    });

    it('rejects an unrecognised body', () => {
        expect(() => parseReadings({ status: 'ok' })).toThrow('Unexpected telemetry response');
    });
});

describe('TelemetryClient', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should require an endpoint', () => {
        expect(() => new TelemetryClient({ endpoint: '', timeoutMs: 100 })).toThrow('TELEMETRY_ENDPOINT is required');
    });

    it('should post the model, variables and lookback window', async () => {
        mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: () => Promise.resolve([]) });
        const client = new TelemetryClient({ endpoint: 'https://telemetry.test/readings', apiKey: 'test-key', timeoutMs: 100 });

        const readings = await client.fetch('SMT60', ['oil_pressure'], 30);

        expect(readings).toEqual([]);
        expect(mockFetch).toHaveBeenCalledWith(
            'https://telemetry.test/readings',
            expect.objectContaining({
                method: 'POST',
                headers: { 'Content-Type': 'application/json', 'x-api-key': 'test-key' },
                body: JSON.stringify({ turbine_model: 'SMT60', variables: ['oil_pressure'], lookback_minutes: 30 }),
            })
        );
    });

    it('should throw with the HTTP status on failure', async () => {
        mockFetch.mockResolvedValueOnce({ ok: false, status: 404, text: () => Promise.resolve('no such turbine') });
        const client = new TelemetryClient({ endpoint: 'https://telemetry.test/readings', timeoutMs: 100 });

        await expect(client.fetch('SMT60', [], 60)).rejects.toThrow('Telemetry API error: 404 - no such turbine');
    });

    it('should time out when the response body stalls', async () => {
        mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: () => new Promise(() => undefined) });
        const client = new TelemetryClient({ endpoint: 'https://telemetry.test/readings', timeoutMs: 50 });

        await expect(client.fetch('SMT60', ['oil_pressure'], 60)).rejects.toThrow('Request timed out after 50ms');
    });
});
