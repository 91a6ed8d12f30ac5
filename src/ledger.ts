import type { StateCache } from './cache.js';
import logger from './logger.js';
import { MAX_UINT256, checkedAdd, checkedSub } from './utils/bigint.js';

export interface LedgerAccountData {
    _id: string; // account name
    balance: bigint;
    allowances: Record<string, bigint>; // spender -> remaining allowance
    delegatee: string | null;
    votes: bigint; // voting power delegated to this account
}

/**
 * Fungible-token ledger the registry moves funds through. A `false` return or a
 * thrown error means the movement did not happen.
 */
export interface TokenLedger {
    balanceOf(account: string): bigint;
    allowance(owner: string, spender: string): bigint;
    transferFrom(spender: string, from: string, to: string, amount: bigint): boolean;
    transfer(from: string, to: string, amount: bigint): boolean;
    delegate(holder: string, delegatee: string): void;
    delegates(holder: string): string | null;
    getVotes(account: string): bigint;
}

/**
 * A ledger this node keeps itself, fed by the upstream token issuer.
 */
export interface IssuableLedger extends TokenLedger {
    mint(to: string, amount: bigint): void;
    approve(owner: string, spender: string, amount: bigint): void;
}

/**
 * Ledger kept in the state cache, with vote delegation that follows balances.
 * Living in the cache means it rolls back together with the registry.
 */
export class CacheTokenLedger implements IssuableLedger {
    constructor(private readonly cache: StateCache) {}

    private account(name: string): LedgerAccountData {
        return this.cache.accounts.findOne(name) ?? { _id: name, balance: 0n, allowances: {}, delegatee: null, votes: 0n };
    }

    private save(account: LedgerAccountData): void {
        this.cache.accounts.upsertOne(account._id, account);
    }

    balanceOf(account: string): bigint {
        return this.account(account).balance;
    }

    allowance(owner: string, spender: string): bigint {
        return this.account(owner).allowances[spender] ?? 0n;
    }

    delegates(holder: string): string | null {
        return this.account(holder).delegatee;
    }

    getVotes(account: string): bigint {
        return this.account(account).votes;
    }

    mint(to: string, amount: bigint): void {
        const account = this.account(to);
        account.balance = checkedAdd(account.balance, amount);
        this.save(account);
        this.moveVotes(null, account.delegatee, amount);
        logger.debug(`[ledger] Minted ${amount} to ${to}`);
    }

    approve(owner: string, spender: string, amount: bigint): void {
        const account = this.account(owner);
        account.allowances[spender] = amount;
        this.save(account);
    }

    transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
        const current = this.allowance(from, spender);
        if (current < amount) {
            logger.warn(`[ledger] Insufficient allowance for ${spender} on ${from}: ${current} < ${amount}`);
            return false;
        }
        if (!this.transfer(from, to, amount)) return false;
        if (current !== MAX_UINT256) {
            const owner = this.account(from);
            owner.allowances[spender] = current - amount;
            this.save(owner);
        }
        return true;
    }

    transfer(from: string, to: string, amount: bigint): boolean {
        const sender = this.account(from);
        if (sender.balance < amount) {
            logger.warn(`[ledger] Insufficient balance for ${from}: ${sender.balance} < ${amount}`);
            return false;
        }
        if (from === to) return true;
        sender.balance -= amount;
        this.save(sender);
        const recipient = this.account(to);
        recipient.balance = checkedAdd(recipient.balance, amount);
        this.save(recipient);
        this.moveVotes(sender.delegatee, recipient.delegatee, amount);
        return true;
    }

    delegate(holder: string, delegatee: string): void {
        const account = this.account(holder);
        const previous = account.delegatee;
        account.delegatee = delegatee;
        this.save(account);
        this.moveVotes(previous, delegatee, account.balance);
        logger.debug(`[ledger] ${holder} delegated votes from ${previous ?? 'none'} to ${delegatee}`);
    }

    private moveVotes(from: string | null, to: string | null, amount: bigint): void {
        if (from === to || amount === 0n) return;
        if (from) {
            const source = this.account(from);
            source.votes = checkedSub(source.votes, amount);
            this.save(source);
        }
        if (to) {
            const target = this.account(to);
            target.votes = checkedAdd(target.votes, amount);
            this.save(target);
        }
    }
}
