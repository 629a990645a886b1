import type { PipelineConfig } from '../config/pipeline-config.js';
import type { TestDescriptor } from '../types/pipeline.js';

interface QualityProvider {
    label: string;
    command: string;
}

const QUALITY_PROVIDERS: Readonly<Record<string, QualityProvider>> = {
    'static-lint': { label: 'Quality Guard (static-lint)', command: 'npx eslint .' },
    typecheck: { label: 'Quality Guard (typecheck)', command: 'npx tsc --noEmit' },
    ruff: { label: 'Quality Guard (ruff)', command: 'ruff check . && ruff format --check .' },
    sonarqube: { label: 'Quality Guard (sonarqube)', command: 'sonar-scanner' },
};

export const KNOWN_QUALITY_PROVIDERS: readonly string[] = Object.keys(QUALITY_PROVIDERS);

export interface QualityGuardResult {
    tests: TestDescriptor[];
    /** Static-check descriptors that were prepended. */
    added: TestDescriptor[];
    unknownProviders: string[];
}

/**
 * Prepend static-check descriptors for the configured providers. They always
 * run on the local environment, whatever the pipeline default is.
 */
export function applyQualityGuard(
    tests: readonly TestDescriptor[],
    qualityChecks: PipelineConfig['qualityChecks'],
): QualityGuardResult {
    if (!qualityChecks.enabled) {
        return { tests: [...tests], added: [], unknownProviders: [] };
    }

    const added: TestDescriptor[] = [];
    const unknownProviders: string[] = [];
    for (const name of new Set(qualityChecks.providers)) {
        const provider = Object.hasOwn(QUALITY_PROVIDERS, name) ? QUALITY_PROVIDERS[name] : undefined;
        if (!provider) {
            unknownProviders.push(name);
            continue;
        }
        added.push({ kind: 'command', label: provider.label, commandOrPath: provider.command, executionEnv: 'local' });
    }
    return { tests: [...added, ...tests], added, unknownProviders };
}
