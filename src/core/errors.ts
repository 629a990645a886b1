export type PipelineErrorCode =
    | 'config_invalid'
    | 'provisioning_failed'
    | 'health_check_timeout'
    | 'tool_not_found'
    | 'pipeline_cancelled';

/** Base class for every failure the orchestrator surfaces to operators. */
export class PipelineError extends Error {
    readonly code: PipelineErrorCode;
    readonly remediation?: string;

    constructor(code: PipelineErrorCode, message: string, remediation?: string) {
        super(message);
        this.name = 'PipelineError';
        this.code = code;
        this.remediation = remediation;
    }

    /** Message plus remediation hint, as shown to operators. */
    describe(): string {
        return this.remediation ? `${this.message} ${this.remediation}` : this.message;
    }
}

/** Malformed or missing configuration. Raised before Preparation starts. */
export class ConfigError extends PipelineError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(
            'config_invalid',
            issues.length > 0 ? `${message} ${issues.join(' ')}` : message,
            'Fix aether.config.json in the target directory and retry.',
        );
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** An endpoint, service or deployment failed to come up. */
export class ProvisioningError extends PipelineError {
    constructor(message: string, remediation?: string, code: PipelineErrorCode = 'provisioning_failed') {
        super(code, message, remediation);
        this.name = 'ProvisioningError';
    }
}

export class HealthCheckTimeoutError extends ProvisioningError {
    readonly url: string;

    constructor(url: string, timeoutSeconds: number) {
        super(
            `Health check for ${url} did not succeed within ${timeoutSeconds}s.`,
            'Check that the service is listening and raise timeoutSeconds if it starts slowly.',
            'health_check_timeout',
        );
        this.name = 'HealthCheckTimeoutError';
        this.url = url;
    }
}

/** A required external binary is not on PATH. */
export class ToolNotFoundError extends PipelineError {
    readonly tool: string;

    constructor(tool: string, guidance: string) {
        super('tool_not_found', `Command '${tool}' not found in PATH.`, guidance);
        this.name = 'ToolNotFoundError';
        this.tool = tool;
    }
}

export class PipelineCancelledError extends PipelineError {
    constructor(phase: string) {
        super('pipeline_cancelled', `Pipeline cancelled during ${phase} phase.`);
        this.name = 'PipelineCancelledError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof PipelineError) return error.describe();
    return error instanceof Error ? error.message : String(error);
}
