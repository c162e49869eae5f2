import type { ZodIssue } from 'zod';
import { VaultRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Config runtime error factory methods
 */
export class ConfigError {
    static invalid(issues: ZodIssue[]) {
        const summary = issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        return new VaultRuntimeError(
            ConfigErrorCode.INVALID_CONFIG,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid configuration: ${summary}`,
            { issues },
            'Fix the listed fields in your environment or configuration overrides'
        );
    }

    static invalidEnvValue(name: string, value: string, expected: string) {
        return new VaultRuntimeError(
            ConfigErrorCode.INVALID_ENV_VALUE,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Environment variable ${name}='${value}' is invalid: expected ${expected}`,
            { name, value, expected },
            `Unset ${name} or set it to ${expected}`
        );
    }
}
