const DAY = 24n * 60n * 60n;
const ETHER = 10n ** 18n;

export interface StakeLevelConfig {
    amount: string;
    lockDuration: string;
    points: string;
}

const config = {
    networkName: 'Boost Staking Devnet',
    stakingTokenSymbol: 'STK',
    stakingTokenName: 'Staking Token',
    stakingTokenPrecision: 18,
    // uint256 upper bound
    maxValue: ((1n << 256n) - 1n).toString(),
    // 78 digits hold any uint256
    dbPadLength: 78,
    registryAccount: 'staking-registry',
    escrowPrefix: 'escrow-',
    eventCategory: 'staking',
    defaultLevels: [
        { amount: (5000n * ETHER).toString(), lockDuration: (180n * DAY).toString(), points: '1000' },
        { amount: (10000n * ETHER).toString(), lockDuration: (365n * DAY).toString(), points: '2000' },
        { amount: (15000n * ETHER).toString(), lockDuration: (730n * DAY).toString(), points: '3000' },
    ] satisfies StakeLevelConfig[],
    accountNameMaxLength: 64,
    allowedAccountChars: 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789.-_:',
    maxBatchWithdraw: 100,
    eventsPageMax: 100,
};

export default config;
