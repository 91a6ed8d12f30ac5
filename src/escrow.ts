import { StakingError, transferFailed, unauthorized } from './errors.js';
import type { TokenLedger } from './ledger.js';
import logger from './logger.js';

/**
 * Runs a ledger movement and reports a refusal or a ledger error as TransferFailed.
 */
export function ledgerTransfer(from: string, to: string, amount: bigint, move: () => boolean): void {
    let ok: boolean;
    try {
        ok = move();
    } catch (err) {
        const failure = transferFailed(from, to, amount);
        failure.details = { ...failure.details, cause: err instanceof Error ? err.message : String(err) };
        throw failure;
    }
    if (!ok) throw transferFailed(from, to, amount);
}

/**
 * Capability held by the transaction executor. Escrow funds move only for the
 * authority an escrow was opened with; a second instance with the same account
 * name is refused.
 */
export class EscrowAuthority {
    constructor(readonly account: string) {}
}

export interface EscrowView {
    ref: string;
    owner: string;
    balance: bigint;
    delegatee: string | null;
}

/**
 * Custody account for every locked stake of one staker. Instances exist only
 * inside a running transaction; readers get an `EscrowView`.
 */
export class EscrowAccount {
    constructor(
        readonly ref: string,
        readonly owner: string,
        private readonly ledger: TokenLedger,
        private readonly authority: EscrowAuthority
    ) {}

    balance(): bigint {
        return this.ledger.balanceOf(this.ref);
    }

    delegatee(): string | null {
        return this.ledger.delegates(this.ref);
    }

    release(authority: EscrowAuthority, amount: bigint, to: string): void {
        this.requireAuthority(authority, 'release escrow funds');
        ledgerTransfer(this.ref, to, amount, () => this.ledger.transfer(this.ref, to, amount));
        logger.debug(`[escrow] ${this.ref} released ${amount} to ${to}`);
    }

    move(authority: EscrowAuthority, amount: bigint, to: EscrowAccount): void {
        this.requireAuthority(authority, 'move escrow funds');
        ledgerTransfer(this.ref, to.ref, amount, () => this.ledger.transfer(this.ref, to.ref, amount));
        logger.debug(`[escrow] ${this.ref} moved ${amount} to ${to.ref}`);
    }

    /**
     * The owner, or the registry on the owner's behalf, redirects the escrow's voting power.
     */
    delegateVotingPower(caller: string | EscrowAuthority, delegatee: string): void {
        if (caller !== this.owner && caller !== this.authority) {
            throw unauthorized(typeof caller === 'string' ? caller : caller.account, `delegate votes of ${this.ref}`);
        }
        try {
            this.ledger.delegate(this.ref, delegatee);
        } catch (err) {
            if (err instanceof StakingError) throw err;
            throw new StakingError('TransferFailed', `delegation of ${this.ref} failed`, { cause: err instanceof Error ? err.message : String(err) });
        }
    }

    private requireAuthority(authority: EscrowAuthority, action: string): void {
        if (authority !== this.authority) throw unauthorized(authority.account, action);
    }
}
