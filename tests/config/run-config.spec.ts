import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
    ConfigError,
    DEFAULT_CONFIG,
    getConfigPath,
    loadRunConfig,
    mergeWithDefaults,
    resolveTarget,
} from '../../src/config/run-config.js';
import { validateRunConfig } from '../../src/config/run-config-schema.js';

describe('run configuration', () => {
    let workspace: string;

    beforeEach(async () => {
        workspace = await mkdtemp(path.join(os.tmpdir(), 'release-verify-config-'));
        vi.stubEnv('RELEASE_VERIFY_CONFIG_PATH', '');
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await rm(workspace, { recursive: true, force: true });
    });

    async function writeConfig(contents: string): Promise<string> {
        const configPath = path.join(workspace, 'release-verify.json');
        await writeFile(configPath, contents, 'utf8');
        return configPath;
    }

    it('uses the defaults when no config file exists and freezes the result', async () => {
        const config = await loadRunConfig(undefined, workspace);

        expect(config).toEqual(DEFAULT_CONFIG);
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.ports)).toBe(true);
        expect(Object.isFrozen(config.build.sourceDirs)).toBe(true);
    });

    it('overlays file values on the defaults section by section', async () => {
        await writeConfig(JSON.stringify({ certificateAuthority: 'staging', ports: { unprivileged: 8443 } }));

        const config = await loadRunConfig(undefined, workspace);

        expect(config.certificateAuthority).toBe('staging');
        expect(config.ports).toEqual({ http: 80, privileged: 443, unprivileged: 8443 });
        expect(config.timing).toEqual(DEFAULT_CONFIG.timing);
    });

    it('rejects malformed JSON with the file path in the message', async () => {
        const configPath = await writeConfig('{ "ports": ');

        await expect(loadRunConfig(undefined, workspace)).rejects.toThrow(
            `Failed to parse config file at ${configPath}`,
        );
    });

    it('collects every validation error', async () => {
        await writeConfig(JSON.stringify({ certificateAuthority: 'test', ports: { http: 0 } }));

        const failure = await loadRunConfig(undefined, workspace).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(ConfigError);
        expect(failure instanceof ConfigError && failure.errors).toEqual([
            "certificateAuthority must be 'staging' or 'production'.",
            'ports.http must be between 1 and 65535.',
        ]);
    });

    it('requires distinct HTTPS ports and at least one source directory', () => {
        const merged = mergeWithDefaults({ ports: { unprivileged: 443 }, build: { sourceDirs: [] } });

        expect(validateRunConfig(merged).errors).toEqual([
            'build.sourceDirs must list at least one directory.',
            'ports.privileged and ports.unprivileged must differ.',
        ]);
    });

    it('rejects an unknown launch mode', () => {
        const merged = mergeWithDefaults({ service: { launchMode: 'root' } });

        expect(validateRunConfig(merged).errors).toEqual([
            "service.launchMode must be 'privileged' or 'unprivileged'.",
        ]);
    });

    it('honours an explicit path and the environment override', () => {
        expect(getConfigPath('conf/ci.json', workspace)).toBe(path.join(workspace, 'conf', 'ci.json'));

        vi.stubEnv('RELEASE_VERIFY_CONFIG_PATH', 'custom.json');
        expect(getConfigPath(undefined, workspace)).toBe(path.join(workspace, 'custom.json'));
    });

    describe('resolveTarget', () => {
        it('prefers the command-line host', async () => {
            expect(await resolveTarget(DEFAULT_CONFIG, ' edge.example.test ', workspace)).toBe('edge.example.test');
        });

        it('reads the first line of the default host file', async () => {
            await writeFile(path.join(workspace, '.remote'), 'edge.example.test\nsecond.example.test\n', 'utf8');

            expect(await resolveTarget(DEFAULT_CONFIG, undefined, workspace)).toBe('edge.example.test');
        });

        it('fails when there is no host anywhere', async () => {
            await expect(resolveTarget(DEFAULT_CONFIG, undefined, workspace)).rejects.toBeInstanceOf(ConfigError);

            await writeFile(path.join(workspace, '.remote'), '\n', 'utf8');
            await expect(resolveTarget(DEFAULT_CONFIG, undefined, workspace)).rejects.toThrow(
                `Default host file ${path.join(workspace, '.remote')} is empty.`,
            );
        });
    });
});
