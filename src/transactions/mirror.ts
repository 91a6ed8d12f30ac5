import { unauthorized } from '../errors.js';
import type { IssuableLedger } from '../ledger.js';
import type { MintableVehicleRegistry } from '../vehicles.js';
import type { StakingContext } from './staking/staking-helpers.js';

/**
 * Token ledger and vehicle registry kept on this node and fed from upstream,
 * with the accounts allowed to issue tokens and vehicles.
 */
export interface UpstreamMirror {
    ledger: IssuableLedger;
    vehicles: MintableVehicleRegistry;
    tokenIssuer: string;
    vehicleIssuer: string;
}

export function requireMirror(ctx: StakingContext, sender: string): UpstreamMirror {
    if (!ctx.mirror) throw unauthorized(sender, 'change token or vehicle state on a node that does not keep it');
    return ctx.mirror;
}
