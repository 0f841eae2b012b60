/**
 * Raised when the simulation cannot start because a dependency is missing or invalid.
 * This is the only error the core lets escape; physics anomalies are corrected in-tick.
 */
export class ConfigurationError extends Error {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(`Invalid simulation setup: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
        this.issues = [...issues];
    }
}

export const isConfigurationError = (error: unknown): error is ConfigurationError =>
    error instanceof ConfigurationError;
