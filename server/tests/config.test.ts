/**
 * config.test.ts
 *
 * Tests for environment parsing and `initialise`.
 */

import {describe, it, expect} from 'vitest';
import {initialise, loadClientConfig, loadConfig} from '../src/config.js';
import {InvalidParamsError, MissingCredentialError} from '../src/dota/errors.js';

describe('loadConfig', () => {
    it('fails with MissingCredentialError without a key', () => {
        expect(() => loadConfig({})).toThrow(MissingCredentialError);
        expect(() => loadConfig({D2_API_KEY: '  '})).toThrow(MissingCredentialError);
    });

    it('applies defaults', () => {
        expect(loadConfig({D2_API_KEY: 'test-secret'})).toEqual({
            client: {
                apiKey: 'test-secret',
                baseUrl: 'https://api.steampowered.com/',
                language: 'en_us',
                timeoutSeconds: undefined,
            },
            server: {
                port: 8080,
                logLevel: 'warn',
                corsOrigin: '*',
                allowAdmin: false,
                referenceDataDir: './data',
                otelEnabled: false,
                otelTracesEndpoint: 'http://otel-collector:4318/v1/traces',
            },
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            D2_API_KEY: 'test-secret',
            DOTA2_LANGUAGE: 'de_de',
            DOTA2_TIMEOUT_SECONDS: '2.5',
            PORT: '9000',
            ALLOW_ADMIN: '1',
            OTEL_ENABLED: 'true',
        });
        expect(config.client.language).toBe('de_de');
        expect(config.client.timeoutSeconds).toBe(2.5);
        expect(config.server.port).toBe(9000);
        expect(config.server.allowAdmin).toBe(true);
        expect(config.server.otelEnabled).toBe(true);
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({D2_API_KEY: 'test-secret', PORT: 'eighty'})).toThrow(InvalidParamsError);
        expect(() => loadConfig({D2_API_KEY: 'test-secret', DOTA2_TIMEOUT_SECONDS: '-1'})).toThrow(
            InvalidParamsError,
        );
    });

    it('does not validate server variables for client settings', () => {
        expect(loadClientConfig({D2_API_KEY: 'test-secret', PORT: 'eighty'}).apiKey).toBe('test-secret');
    });
});

describe('initialise', () => {
    it('prefers the explicit key', () => {
        const client = initialise({apiKey: 'test-secret'}, {});
        expect(client.language).toBe('en_us');
    });

    it('falls back to D2_API_KEY', () => {
        const client = initialise({}, {D2_API_KEY: 'test-secret', DOTA2_LANGUAGE: 'pt_br'});
        expect(client.language).toBe('pt_br');
    });

    it('fails when neither is present', () => {
        expect(() => initialise({}, {})).toThrow(MissingCredentialError);
    });
});
