import type { LifecycleAction } from '../types/lifecycle.js';
import { LifecycleError } from '../errors/lifecycleError.js';

/**
 * Authorization is owned by whoever implements this; the lifecycle
 * services only ask before they write.
 */
export interface AccessControl {
    authorized(caller: string, action: LifecycleAction): boolean;
}

export type CallerRole = 'operator' | 'holder';

export function requireAuthorized(accessControl: AccessControl, caller: string, action: LifecycleAction): void {
    if (!accessControl.authorized(caller, action)) {
        throw new LifecycleError('Unauthorized', `${caller || 'anonymous'} may not ${action}`);
    }
}

/**
 * Maps API keys to roles. Operators may run every action, holders may only renew.
 */
export class ApiKeyAccessControl implements AccessControl {
    private roles = new Map<string, CallerRole>();

    constructor(operatorKeys: readonly string[] = [], holderKeys: readonly string[] = []) {
        holderKeys.forEach((key) => this.roles.set(key, 'holder'));
        operatorKeys.forEach((key) => this.roles.set(key, 'operator'));
    }

    public grant(key: string, role: CallerRole): void {
        this.roles.set(key, role);
    }

    public roleOf(key: string): CallerRole | undefined {
        return this.roles.get(key);
    }

    public authorized(caller: string, action: LifecycleAction): boolean {
        const role = this.roles.get(caller);
        if (role === 'operator') {
            return true;
        }
        return role === 'holder' && action === 'renew';
    }
}
