/**
 * @fileoverview Unit tests for configuration loading and validation.
 * @module test/unit/config
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    CONFIG_FILE,
    getDefault,
    loadConfig,
    mergeConfigs,
    validateConfig,
} from '../../src/state/config.js';

describe('getDefault', () => {
    it('selects everything and skips private declarations', () => {
        expect(getDefault()).toEqual({
            select: null,
            ignore: [],
            includePrivate: false,
            excludeMagic: false,
            format: 'compact',
        });
    });

    it('returns a fresh object each time', () => {
        expect(getDefault()).not.toBe(getDefault());
    });
});

describe('validateConfig', () => {
    it('maps kebab-case keys to config fields', () => {
        expect(
            validateConfig({ select: ['PR'], 'include-private': true, 'exclude-magic': false, format: 'detailed' })
        ).toEqual({
            ok: true,
            value: { select: ['PR'], includePrivate: true, excludeMagic: false, format: 'detailed' },
        });
    });

    it('keeps an explicit null select', () => {
        expect(validateConfig({ select: null })).toEqual({ ok: true, value: { select: null } });
    });

    it('rejects unknown keys', () => {
        const result = validateConfig({ includePrivate: true });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.type).toBe('validation');
        expect(result.error.message).toContain('includePrivate');
    });

    it('names the field with a bad value', () => {
        const result = validateConfig({ format: 'fancy' });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message.startsWith(`Invalid ${CONFIG_FILE}: format:`)).toBe(true);
    });

    it('rejects non-objects', () => {
        expect(validateConfig(null).ok).toBe(false);
        expect(validateConfig(['PR']).ok).toBe(false);
    });
});

describe('mergeConfigs', () => {
    it('overrides only the given fields', () => {
        expect(mergeConfigs(getDefault(), { ignore: ['EX01'], format: 'detailed' })).toEqual({
            ...getDefault(),
            ignore: ['EX01'],
            format: 'detailed',
        });
    });

    it('lets an explicit null select reset the selection', () => {
        const selected = mergeConfigs(getDefault(), { select: ['PR'] });
        expect(selected.select).toEqual(['PR']);
        expect(mergeConfigs(selected, { select: null }).select).toBeNull();
        expect(mergeConfigs(selected, {}).select).toEqual(['PR']);
    });
});

describe('loadConfig', () => {
    let directory: string;

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), 'docstring-lint-'));
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('returns defaults when the file does not exist', async () => {
        expect(await loadConfig(directory)).toEqual({ ok: true, value: getDefault() });
    });

    it('merges the file over the defaults', async () => {
        await writeFile(join(directory, CONFIG_FILE), '{"ignore": ["EX01"], "exclude-magic": true}');
        expect(await loadConfig(directory)).toEqual({
            ok: true,
            value: { ...getDefault(), ignore: ['EX01'], excludeMagic: true },
        });
    });

    it('reports invalid JSON as a parse error', async () => {
        await writeFile(join(directory, CONFIG_FILE), '{');
        const result = await loadConfig(directory);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.type).toBe('parse');
        expect(result.error.message.startsWith(`Invalid JSON in ${CONFIG_FILE}:`)).toBe(true);
    });

    it('reports schema violations as validation errors', async () => {
        await writeFile(join(directory, CONFIG_FILE), '{"ignore": "EX01"}');
        const result = await loadConfig(directory);
        expect(result.ok ? null : result.error.type).toBe('validation');
    });

    it('reports unreadable locations as io errors', async () => {
        const file = join(directory, 'not-a-directory');
        await writeFile(file, '');
        const result = await loadConfig(file);
        expect(result.ok ? null : result.error.type).toBe('io');
    });
});
