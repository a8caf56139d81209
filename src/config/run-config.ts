import * as fs from 'fs/promises';
import * as path from 'path';
import type { CertificateAuthorityMode, PortCandidate, ServiceMode } from '../types/verification.js';
import { validateRunConfig } from './run-config-schema.js';

export const DEFAULT_CONFIG_FILE = 'release-verify.json';

export interface RunConfig {
    target: {
        defaultHostFile: string;
        sshUser: string;
    };
    certificateAuthority: CertificateAuthorityMode;
    build: {
        profile: string;
        command: string;
        artifactPath: string;
        sourceDirs: string[];
        timeoutMs: number;
    };
    service: {
        binaryName: string;
        documentRoot: string;
        certStorageRoot: string;
        logFile: string;
        extraFlags: string[];
        unprivilegedFlag: string;
        launchMode: ServiceMode;
    };
    ports: {
        http: number;
        privileged: number;
        unprivileged: number;
    };
    timing: {
        startupSettleMs: number;
        stageGapMs: number;
        sessionSettleMs: number;
        livenessAttempts: number;
        livenessIntervalMs: number;
        tcpTimeoutMs: number;
        fingerprintTimeoutMs: number;
        remoteCommandTimeoutMs: number;
    };
    diagnostics: {
        failureTailLines: number;
        startupTailLines: number;
        bodyPreviewLines: number;
    };
    reports: {
        dir: string;
    };
}

export const DEFAULT_CONFIG: RunConfig = {
    target: {
        defaultHostFile: '.remote',
        sshUser: 'root',
    },
    certificateAuthority: 'production',
    build: {
        profile: 'lto',
        command: 'cargo build --bin easyp --profile lto',
        artifactPath: path.join('target', 'lto', 'easyp'),
        sourceDirs: ['src'],
        timeoutMs: 600_000,
    },
    service: {
        binaryName: 'easyp',
        documentRoot: '/var/www/html',
        certStorageRoot: '/var/lib/easyp/certs',
        logFile: 'server.log',
        extraFlags: [],
        unprivilegedFlag: '--over-9000',
        launchMode: 'privileged',
    },
    ports: {
        http: 80,
        privileged: 443,
        unprivileged: 9443,
    },
    timing: {
        startupSettleMs: 10_000,
        stageGapMs: 1_000,
        sessionSettleMs: 3_000,
        livenessAttempts: 10,
        livenessIntervalMs: 1_000,
        tcpTimeoutMs: 5_000,
        fingerprintTimeoutMs: 15_000,
        remoteCommandTimeoutMs: 60_000,
    },
    diagnostics: {
        failureTailLines: 20,
        startupTailLines: 5,
        bodyPreviewLines: 5,
    },
    reports: {
        dir: path.join('memory', 'release-verify'),
    },
};

export class ConfigError extends Error {
    readonly errors: string[];

    constructor(message: string, errors: string[] = [message]) {
        super(message);
        this.name = 'ConfigError';
        this.errors = errors;
    }
}

export function getConfigPath(overridePath?: string, cwd: string = process.cwd()): string {
    if (overridePath) return path.resolve(cwd, overridePath);
    if (process.env.RELEASE_VERIFY_CONFIG_PATH) {
        return path.resolve(cwd, process.env.RELEASE_VERIFY_CONFIG_PATH);
    }
    return path.join(cwd, DEFAULT_CONFIG_FILE);
}

/** Privileged port first: the first reachable candidate decides the mode. */
export function portCandidates(config: RunConfig): PortCandidate[] {
    return [
        { port: config.ports.privileged, mode: 'privileged' },
        { port: config.ports.unprivileged, mode: 'unprivileged' },
    ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneDefaults(): RunConfig {
    return structuredClone(DEFAULT_CONFIG);
}

/**
 * Overlay each known section of `loaded` on the defaults. Field types are not
 * checked here; {@link validateRunConfig} runs on the merged result.
 */
export function mergeWithDefaults(loaded: unknown): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...cloneDefaults() };
    if (!isRecord(loaded)) return merged;

    for (const [key, value] of Object.entries(loaded)) {
        const base = merged[key];
        merged[key] = isRecord(base) && isRecord(value) ? { ...base, ...value } : value;
    }
    return merged;
}

function deepFreeze<T>(value: T): Readonly<T> {
    if (typeof value === 'object' && value !== null) {
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Build the run configuration once: defaults, then the optional JSON file.
 * A missing file means defaults; a malformed or invalid one throws {@link ConfigError}.
 */
export async function loadRunConfig(overridePath?: string, cwd: string = process.cwd()): Promise<Readonly<RunConfig>> {
    const targetPath = getConfigPath(overridePath, cwd);
    let loaded: unknown = {};
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        loaded = JSON.parse(rawData) as unknown;
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code !== 'ENOENT') {
            throw new ConfigError(`Failed to parse config file at ${targetPath}: ${fsError.message}`);
        }
    }

    const merged = mergeWithDefaults(loaded);
    const validation = validateRunConfig(merged);
    if (!validation.valid || !validation.config) {
        throw new ConfigError(`Config file at ${targetPath} is invalid.`, validation.errors);
    }
    return deepFreeze(validation.config);
}

/**
 * Resolve the target host: the CLI argument wins, else the first line of the
 * default-host file.
 */
export async function resolveTarget(
    config: Readonly<RunConfig>,
    argHost: string | undefined,
    cwd: string = process.cwd(),
): Promise<string> {
    const explicit = argHost?.trim();
    if (explicit) return explicit;

    const hostFile = path.resolve(cwd, config.target.defaultHostFile);
    let raw: string;
    try {
        raw = await fs.readFile(hostFile, 'utf-8');
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        throw new ConfigError(
            `No target host given and default host file ${hostFile} could not be read: ${fsError.message}`,
        );
    }
    const host = raw.split(/\r?\n/)[0]?.trim();
    if (!host) {
        throw new ConfigError(`Default host file ${hostFile} is empty.`);
    }
    return host;
}
