/**
 * EconomyService: Composition root for the economy core.
 *
 * Route handlers delegate to the engines exposed here. One instance
 * serves every tenant: isolation comes from the TenantScope each call
 * carries, not from separate instances.
 */

import pino from "pino";
import type { Logger } from "pino";
import { InMemoryEconomyStore } from "@classbank/store";
import type { EconomyStore, StoreHealth } from "@classbank/store";
import { LedgerStore } from "@classbank/ledger";
import { ClaimsEngine, EnrollmentManager, PolicyCatalog } from "@classbank/insurance";
import { AuditLog } from "./audit-log.js";
import type { AuditChainResult } from "./audit-log.js";

// =============================================================================
// Configuration
// =============================================================================

export interface EconomyServiceOptions {
  /** Defaults to a fresh in-memory store */
  readonly store?: EconomyStore | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
  readonly logger?: Logger | undefined;
}

export interface EconomyHealth {
  readonly ready: boolean;
  readonly store: StoreHealth;
  readonly auditChain: AuditChainResult;
}

// =============================================================================
// Service
// =============================================================================

export class EconomyService {
  readonly store: EconomyStore;
  readonly ledger: LedgerStore;
  readonly catalog: PolicyCatalog;
  readonly enrollments: EnrollmentManager;
  readonly claims: ClaimsEngine;
  readonly auditLog: AuditLog;
  readonly logger: Logger;

  private _ready = false;

  constructor(options?: EconomyServiceOptions) {
    this.logger = options?.logger ?? pino({ level: "silent" });
    this.store = options?.store ?? new InMemoryEconomyStore();

    const engineOptions = {
      clock: options?.clock,
      generateId: options?.generateId,
    };
    this.ledger = new LedgerStore(this.store, {
      ...engineOptions,
      logger: this.logger.child({ component: "ledger" }),
    });
    this.catalog = new PolicyCatalog(this.store, {
      ...engineOptions,
      logger: this.logger.child({ component: "policy-catalog" }),
    });
    this.enrollments = new EnrollmentManager(this.store, this.ledger, this.catalog, {
      ...engineOptions,
      logger: this.logger.child({ component: "enrollments" }),
    });
    this.claims = new ClaimsEngine(this.store, this.ledger, this.catalog, this.enrollments, {
      ...engineOptions,
      logger: this.logger.child({ component: "claims" }),
    });
    this.auditLog = new AuditLog(options?.clock);

    this._ready = true;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  /**
   * Deep health: store reachable and audit chain intact.
   */
  async health(): Promise<EconomyHealth> {
    const store = await this.store.health();
    const auditChain = this.auditLog.verify();
    return {
      ready: this._ready && store.ok && auditChain.valid,
      store,
      auditChain,
    };
  }

  stop(): void {
    this._ready = false;
  }
}
