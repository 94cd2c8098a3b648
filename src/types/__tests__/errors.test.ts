/**
 * shadow-alter - Error Types Unit Tests
 *
 * Tests for custom error classes covering construction,
 * error codes, details, inheritance, and name properties.
 */

import { describe, it, expect } from 'vitest';
import {
    ShadowAlterError,
    ConnectError,
    OperationError,
    ConnectivityLostError,
    TimeoutError,
    SessionClosedError,
    ValidationError,
    InvalidIdentifierError,
    isRetryableConnectFailure,
    isSessionError
} from '../errors.js';

// =============================================================================
// ShadowAlterError (Base Class)
// =============================================================================

describe('ShadowAlterError', () => {
    it('should create error with message, code, and details', () => {
        const error = new ShadowAlterError('Test error', 'TEST_CODE', { key: 'value' });

        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('Test error');
        expect(error.code).toBe('TEST_CODE');
        expect(error.details).toEqual({ key: 'value' });
        expect(error.name).toBe('ShadowAlterError');
    });

    it('should leave details undefined when not given', () => {
        expect(new ShadowAlterError('x', 'Y').details).toBeUndefined();
    });
});

// =============================================================================
// Session errors
// =============================================================================

describe('ConnectError', () => {
    it('should carry its reason in details', () => {
        const error = new ConnectError('refused', 'network', { attempts: 3 });

        expect(error).toBeInstanceOf(ShadowAlterError);
        expect(error.name).toBe('ConnectError');
        expect(error.code).toBe('CONNECT_ERROR');
        expect(error.kind).toBe('connect');
        expect(error.reason).toBe('network');
        expect(error.details).toEqual({ reason: 'network', attempts: 3 });
    });

    it('should be retryable only for transport failures', () => {
        expect(new ConnectError('x', 'network').retryable).toBe(true);
        expect(new ConnectError('x', 'timeout').retryable).toBe(true);
        expect(new ConnectError('x', 'auth').retryable).toBe(false);
        expect(new ConnectError('x', 'protocol').retryable).toBe(false);
        expect(new ConnectError('x', 'schema-missing').retryable).toBe(false);
        expect(new ConnectError('x', 'config').retryable).toBe(false);
    });

    it('should agree with isRetryableConnectFailure', () => {
        expect(isRetryableConnectFailure('timeout')).toBe(true);
        expect(isRetryableConnectFailure('auth')).toBe(false);
    });
});

describe('OperationError', () => {
    it('should use the operation code', () => {
        const error = new OperationError('syntax error', { driverCode: 'ER_PARSE_ERROR' });

        expect(error.name).toBe('OperationError');
        expect(error.code).toBe('OPERATION_ERROR');
        expect(error.kind).toBe('operation');
        expect(error.details).toEqual({ driverCode: 'ER_PARSE_ERROR' });
    });
});

describe('ConnectivityLostError', () => {
    it('should use the connectivity code', () => {
        const error = new ConnectivityLostError('connection reset');

        expect(error.name).toBe('ConnectivityLostError');
        expect(error.code).toBe('CONNECTIVITY_LOST');
        expect(error.kind).toBe('connectivity-lost');
    });
});

describe('TimeoutError', () => {
    it('should carry its trigger in details', () => {
        const error = new TimeoutError('Timed out after 50ms', 'deadline', { timeoutMs: 50 });

        expect(error.name).toBe('TimeoutError');
        expect(error.code).toBe('TIMEOUT');
        expect(error.trigger).toBe('deadline');
        expect(error.details).toEqual({ trigger: 'deadline', timeoutMs: 50 });
    });
});

describe('SessionClosedError', () => {
    it('should default to no failure', () => {
        const error = new SessionClosedError('Session is closed');

        expect(error.name).toBe('SessionClosedError');
        expect(error.code).toBe('SESSION_CLOSED');
        expect(error.failure).toBeNull();
        expect(error.details).toBeUndefined();
    });

    it('should reference the failure that ended the session', () => {
        const failure = new ConnectError('bad password', 'auth');
        const error = new SessionClosedError('Session failed', failure);

        expect(error.failure).toBe(failure);
        expect(error.details).toEqual({ failure: 'CONNECT_ERROR' });
    });
});

describe('isSessionError', () => {
    it('should accept every session error', () => {
        expect(isSessionError(new ConnectError('x', 'auth'))).toBe(true);
        expect(isSessionError(new OperationError('x'))).toBe(true);
        expect(isSessionError(new ConnectivityLostError('x'))).toBe(true);
        expect(isSessionError(new TimeoutError('x', 'cancelled'))).toBe(true);
        expect(isSessionError(new SessionClosedError('x'))).toBe(true);
    });

    it('should reject other errors', () => {
        expect(isSessionError(new ValidationError('x'))).toBe(false);
        expect(isSessionError(new Error('x'))).toBe(false);
        expect(isSessionError('x')).toBe(false);
    });
});

// =============================================================================
// Input errors
// =============================================================================

describe('ValidationError', () => {
    it('should use the validation code', () => {
        const error = new ValidationError('Invalid plan', { issues: [] });

        expect(error.name).toBe('ValidationError');
        expect(error.code).toBe('VALIDATION_ERROR');
        expect(error.details).toEqual({ issues: [] });
    });
});

describe('InvalidIdentifierError', () => {
    it('should quote the identifier in its message', () => {
        const error = new InvalidIdentifierError('bad-name', 'contains a dash');

        expect(error.message).toBe('Invalid identifier "bad-name": contains a dash');
        expect(error.identifier).toBe('bad-name');
        expect(error.reason).toBe('contains a dash');
        expect(error.details).toEqual({ identifier: 'bad-name' });
    });
});
