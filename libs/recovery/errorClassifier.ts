/**
 * Rebound Error Classifier
 *
 * Maps free-text tool failures onto one ErrorKind.
 * Classification is total: text that matches nothing is `unknown`.
 */

import { ErrorKind, ExceptionKind, FailureInput } from './recoveryTypes.js';

interface ErrorPattern {
    readonly pattern: RegExp;
    readonly errorKind: ErrorKind;
}

/**
 * Known error patterns mapped to error kinds.
 * Order matters: first match wins. "host not found" therefore lands on the
 * earlier `not found` rule (tool_not_found), not on target_unreachable.
 */
const ERROR_PATTERNS: readonly ErrorPattern[] = [
    { pattern: /timeout|timed out|connection timeout|read timeout/, errorKind: 'timeout' },
    { pattern: /operation timed out|command timeout/, errorKind: 'timeout' },

    { pattern: /permission denied|access denied|forbidden|not authorized/, errorKind: 'permission_denied' },
    { pattern: /sudo required|root required|insufficient privileges/, errorKind: 'permission_denied' },

    { pattern: /network unreachable|host unreachable|no route to host/, errorKind: 'network_unreachable' },
    { pattern: /connection refused|connection reset|network error/, errorKind: 'network_unreachable' },

    { pattern: /rate limit|too many requests|throttled|429/, errorKind: 'rate_limited' },
    { pattern: /request limit exceeded|quota exceeded/, errorKind: 'rate_limited' },

    { pattern: /command not found|no such file or directory|not found/, errorKind: 'tool_not_found' },
    { pattern: /executable not found|binary not found/, errorKind: 'tool_not_found' },

    { pattern: /invalid argument|invalid option|unknown option/, errorKind: 'invalid_parameters' },
    { pattern: /bad parameter|invalid parameter|syntax error/, errorKind: 'invalid_parameters' },

    { pattern: /out of memory|memory error|disk full|no space left/, errorKind: 'resource_exhausted' },
    { pattern: /resource temporarily unavailable|too many open files/, errorKind: 'resource_exhausted' },

    { pattern: /authentication failed|login failed|invalid credentials/, errorKind: 'authentication_failed' },
    { pattern: /unauthorized|invalid token|expired token/, errorKind: 'authentication_failed' },

    { pattern: /target unreachable|target not responding|target down/, errorKind: 'target_unreachable' },
    { pattern: /host not found|dns resolution failed/, errorKind: 'target_unreachable' },

    { pattern: /parse error|parsing failed|invalid format|malformed/, errorKind: 'parsing_error' },
    { pattern: /json decode error|xml parse error|invalid json/, errorKind: 'parsing_error' }
];

const EXCEPTION_KIND_MAP: Readonly<Record<ExceptionKind, ErrorKind>> = {
    timeout: 'timeout',
    permission: 'permission_denied',
    connectivity: 'network_unreachable',
    not_found: 'tool_not_found'
};

/**
 * Node system error codes, checked before error names.
 */
const ERROR_CODE_MAP: Readonly<Record<string, ExceptionKind>> = {
    ETIMEDOUT: 'timeout',
    ESOCKETTIMEDOUT: 'timeout',
    EACCES: 'permission',
    EPERM: 'permission',
    ECONNREFUSED: 'connectivity',
    ECONNRESET: 'connectivity',
    EHOSTUNREACH: 'connectivity',
    ENETUNREACH: 'connectivity',
    EPIPE: 'connectivity',
    ENOENT: 'not_found'
};

/**
 * Classify a failure into one ErrorKind.
 *
 * 1. An exception tag, when present, decides immediately.
 * 2. Otherwise the lower-cased message is tested against ERROR_PATTERNS
 *    in declared order.
 */
export function classifyError(message: string, exceptionKind?: ExceptionKind): ErrorKind {
    if (exceptionKind) {
        return EXCEPTION_KIND_MAP[exceptionKind];
    }

    const text = message.toLowerCase();
    const matched = ERROR_PATTERNS.find(p => p.pattern.test(text));

    return matched ? matched.errorKind : 'unknown';
}

/**
 * Derive an exception tag from a thrown value, if it carries one.
 */
export function exceptionKindOf(error: unknown): ExceptionKind | undefined {
    if (!(error instanceof Error)) return undefined;

    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code && Object.hasOwn(ERROR_CODE_MAP, code)) {
        return ERROR_CODE_MAP[code];
    }

    if (error.name === 'TimeoutError') return 'timeout';
    return undefined;
}

/**
 * Normalize anything thrown by a tool run into a FailureInput.
 */
export function describeFailure(error: unknown): FailureInput {
    if (error instanceof Error) {
        const exceptionKind = exceptionKindOf(error);
        return {
            message: error.message,
            ...(exceptionKind ? { exceptionKind } : {}),
            ...(error.stack ? { stackTrace: error.stack } : {})
        };
    }

    if (typeof error === 'string') {
        return { message: error };
    }

    if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
        return { message: error.message };
    }

    return { message: String(error) };
}
