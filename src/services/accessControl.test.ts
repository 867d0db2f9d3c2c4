import { describe, it, expect } from 'vitest';
import { ApiKeyAccessControl, requireAuthorized } from './accessControl.js';
import { catchLifecycleError } from '../__tests__/fixtures.js';

describe('ApiKeyAccessControl', () => {
    const accessControl = new ApiKeyAccessControl(['test-operator-key'], ['test-holder-key']);

    it('lets operators run every action', () => {
        expect(accessControl.authorized('test-operator-key', 'finish')).toBe(true);
        expect(accessControl.authorized('test-operator-key', 'renew')).toBe(true);
    });

    it('lets holders only renew', () => {
        expect(accessControl.authorized('test-holder-key', 'renew')).toBe(true);
        expect(accessControl.authorized('test-holder-key', 'mint')).toBe(false);
    });

    it('gives an operator key listed as both the operator role', () => {
        const both = new ApiKeyAccessControl(['shared-key'], ['shared-key']);

        expect(both.roleOf('shared-key')).toBe('operator');
    });

    it('grants roles after construction', () => {
        const granted = new ApiKeyAccessControl();
        granted.grant('late-key', 'holder');

        expect(granted.roleOf('late-key')).toBe('holder');
        expect(granted.authorized('unknown-key', 'renew')).toBe(false);
    });

    it('requireAuthorized throws a 403 lifecycle error', () => {
        const error = catchLifecycleError(() => requireAuthorized(accessControl, 'test-holder-key', 'pause'));

        expect(error.code).toBe('Unauthorized');
        expect(error.message).toBe('test-holder-key may not pause');
        expect(error.statusCode).toBe(403);
    });
});
