import { ethers } from "ethers";
import { Journal, journaledSet } from "./journal";
import type {
  Address,
  Erc20Token,
  MintEntrypoint,
  PriceFeed,
  RoundData,
  SaleRuntime,
} from "./types";
import { toAddress } from "./utils";

const DEPLOYER = ethers.utils.getAddress("0x00000000000000000000000000000000000000de");

export interface LocalChainOptions {
  /** Starting unix time for the manual clock. */
  timestamp?: number;
  /** Use a live clock instead (e.g. wall time); `warp` is then unavailable. */
  clock?: () => number;
}

export interface LocalTokenOptions {
  name: string;
  symbol: string;
  decimals: number;
  mintable?: boolean;
}

/** Anything the chain can host at an address. */
export type HostedContract = Erc20Token | (Erc20Token & MintEntrypoint) | PriceFeed;

/**
 * In-process ledger implementing every collaborator the sale system talks
 * to: ERC-20 style tokens, a mint entrypoint, price feeds, native balances
 * and a clock. All writes go through the shared journal, so a failed sale
 * operation rolls token movements back along with sale state.
 */
export class LocalChain implements SaleRuntime {
  readonly journal = new Journal();

  private timestamp: number;
  private readonly clock?: () => number;
  private nonce = 0;
  private readonly native = new Map<Address, bigint>();
  private readonly nativeRejecters = new Set<Address>();
  private readonly tokens = new Map<Address, Erc20Token>();
  private readonly minters = new Map<Address, MintEntrypoint>();
  private readonly feeds = new Map<Address, PriceFeed>();

  constructor(options: LocalChainOptions = {}) {
    this.clock = options.clock;
    this.timestamp = options.timestamp ?? 1_700_000_000;
  }

  // ── Clock ─────────────────────────────────────────────────────────

  now(): number {
    return this.clock ? this.clock() : this.timestamp;
  }

  warp(timestamp: number): void {
    if (this.clock) throw new Error("Cannot warp a chain driven by a live clock");
    this.timestamp = timestamp;
  }

  advance(seconds: number): void {
    this.warp(this.now() + seconds);
  }

  // ── Accounts & deployment ──────────────────────────────────────────

  createAccount(): Address {
    this.nonce += 1;
    return ethers.utils.getContractAddress({ from: DEPLOYER, nonce: this.nonce });
  }

  deployToken(options: LocalTokenOptions): LocalToken {
    const token = new LocalToken(this.createAccount(), this.journal, options);
    this.tokens.set(token.address, token);
    if (token.mintable) this.minters.set(token.address, token);
    return token;
  }

  deployPriceFeed(answer: bigint, updatedAt = this.now()): LocalPriceFeed {
    const feed = new LocalPriceFeed(this.createAccount(), answer, updatedAt);
    this.feeds.set(feed.address, feed);
    return feed;
  }

  /** Host a custom contract (e.g. a misbehaving token in tests). */
  host<T extends HostedContract>(build: (address: Address) => T): T {
    const address = this.createAccount();
    const contract = build(address);
    const hosted: HostedContract = contract;
    if ("latestAnswer" in hosted) {
      this.feeds.set(address, hosted);
    } else {
      this.tokens.set(address, hosted);
      if ("mint" in hosted) this.minters.set(address, hosted);
    }
    return contract;
  }

  // ── SaleRuntime ───────────────────────────────────────────────────

  token(address: Address): Erc20Token {
    const token = this.tokens.get(toAddress(address));
    if (!token) throw new Error(`No token deployed at ${address}`);
    return token;
  }

  minter(address: Address): MintEntrypoint {
    const minter = this.minters.get(toAddress(address));
    if (!minter) throw new Error(`${address} has no mint entrypoint`);
    return minter;
  }

  priceFeed(address: Address): PriceFeed {
    const feed = this.feeds.get(toAddress(address));
    if (!feed) throw new Error(`No price feed deployed at ${address}`);
    return feed;
  }

  nativeBalanceOf(owner: Address): bigint {
    return this.native.get(toAddress(owner)) ?? 0n;
  }

  transferNative(from: Address, to: Address, amount: bigint): boolean {
    const sender = toAddress(from);
    const recipient = toAddress(to);
    if (amount < 0n) return false;
    if (this.nativeRejecters.has(recipient)) return false;

    const balance = this.nativeBalanceOf(sender);
    if (balance < amount) return false;

    journaledSet(this.journal, this.native, sender, balance - amount);
    journaledSet(this.journal, this.native, recipient, this.nativeBalanceOf(recipient) + amount);
    return true;
  }

  // ── Test & dev helpers ────────────────────────────────────────────

  setNativeBalance(owner: Address, amount: bigint): void {
    journaledSet(this.journal, this.native, toAddress(owner), amount);
  }

  /** Make `owner` refuse incoming native transfers, like a contract without a receive hook. */
  rejectNative(owner: Address, reject = true): void {
    const address = toAddress(owner);
    if (reject) {
      this.nativeRejecters.add(address);
    } else {
      this.nativeRejecters.delete(address);
    }
  }
}

/**
 * ERC-20 style token. Transfers report failure by returning false; minting
 * is open to granted minters only and only when the token is mintable.
 */
export class LocalToken implements Erc20Token, MintEntrypoint {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly mintable: boolean;

  private supply = 0n;
  private readonly balances = new Map<Address, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private readonly minterSet = new Set<Address>();

  constructor(
    readonly address: Address,
    private readonly journal: Journal,
    options: LocalTokenOptions
  ) {
    this.name = options.name;
    this.symbol = options.symbol;
    this.decimals = options.decimals;
    this.mintable = options.mintable ?? false;
  }

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(owner: Address): bigint {
    return this.balances.get(toAddress(owner)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(caller: Address, spender: Address, amount: bigint): boolean {
    if (amount < 0n) return false;
    journaledSet(this.journal, this.allowances, allowanceKey(caller, spender), amount);
    return true;
  }

  transfer(caller: Address, to: Address, amount: bigint): boolean {
    return this.move(caller, to, amount);
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean {
    const key = allowanceKey(from, caller);
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) return false;
    if (!this.move(from, to, amount)) return false;
    journaledSet(this.journal, this.allowances, key, allowed - amount);
    return true;
  }

  mint(caller: Address, recipient: Address, amount: bigint): boolean {
    if (!this.mintable || !this.minterSet.has(toAddress(caller)) || amount < 0n) return false;
    this.credit(recipient, amount);
    return true;
  }

  grantMinter(account: Address): void {
    this.minterSet.add(toAddress(account));
  }

  /** Credit `amount` out of thin air; for funding test and dev accounts. */
  faucet(to: Address, amount: bigint): void {
    this.credit(to, amount);
  }

  private credit(to: Address, amount: bigint): void {
    const recipient = toAddress(to);
    const supply = this.supply;
    this.journal.record(() => {
      this.supply = supply;
    });
    this.supply = supply + amount;
    journaledSet(this.journal, this.balances, recipient, this.balanceOf(recipient) + amount);
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    const sender = toAddress(from);
    const recipient = toAddress(to);
    const balance = this.balanceOf(sender);
    if (amount < 0n || balance < amount) return false;

    journaledSet(this.journal, this.balances, sender, balance - amount);
    journaledSet(this.journal, this.balances, recipient, this.balanceOf(recipient) + amount);
    return true;
  }
}

export class LocalPriceFeed implements PriceFeed {
  constructor(
    readonly address: Address,
    private answer: bigint,
    private updatedAt: number
  ) {}

  latestAnswer(): RoundData {
    return { answer: this.answer, updatedAt: this.updatedAt };
  }

  setAnswer(answer: bigint, updatedAt = this.updatedAt): void {
    this.answer = answer;
    this.updatedAt = updatedAt;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${toAddress(owner)}:${toAddress(spender)}`;
}
