/**
 * NetworkService — Composition root for the trust-line engine.
 *
 * Route handlers delegate to this service; they never import the
 * engine directly. The service adds what a host needs around the
 * engine: structured logs, business metrics and an audit trail of
 * committed commands.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Command,
  CommandResult,
  CommandType,
  ParticipantId,
  TrustLine,
} from "@trustnet/types";
import { TrustLineError, TrustLineNetwork } from "@trustnet/trust-lines";
import type { NetworkSnapshot } from "@trustnet/trust-lines";
import type { MetricsCollector } from "../middleware/metrics.js";
import { AuditLog } from "./audit-log.js";

// =============================================================================
// Configuration
// =============================================================================

export interface NetworkServiceConfig {
  /** The only participant allowed to freeze lines */
  readonly admin: ParticipantId;
  readonly maxHops?: number | undefined;
  readonly clock?: (() => string) | undefined;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
  readonly metrics?: MetricsCollector | undefined;
  /** Snapshot to restore on startup (untrusted; validated in full) */
  readonly snapshot?: unknown;
}

const READ_COMMANDS: ReadonlySet<CommandType> = new Set(["balance", "credit"]);

export const COMMANDS_METRIC = "trustnet_commands_total";

// =============================================================================
// Service
// =============================================================================

export class NetworkService {
  readonly network: TrustLineNetwork;
  readonly auditLog: AuditLog;

  private readonly _logger: Logger;
  private readonly _metrics: MetricsCollector | undefined;

  constructor(config: NetworkServiceConfig) {
    const networkConfig = {
      admin: config.admin,
      maxHops: config.maxHops,
      clock: config.clock,
    };
    this.network =
      config.snapshot !== undefined
        ? TrustLineNetwork.fromSnapshot(networkConfig, config.snapshot)
        : new TrustLineNetwork(networkConfig);
    this.auditLog = new AuditLog(this.network.config.clock);
    this._logger = config.logger ?? pino({ level: "silent" });
    this._metrics = config.metrics;
  }

  // ─── Commands ────────────────────────────────────────────────────

  /**
   * Run one command on behalf of `caller`.
   *
   * Committed mutations are audited and logged at info; rejections are
   * logged at warn with their code and rethrown unchanged.
   */
  execute(caller: ParticipantId, command: Command): CommandResult {
    let result: CommandResult;
    try {
      result = this.network.execute(caller, command);
    } catch (error) {
      if (error instanceof TrustLineError) {
        this._logger.warn(
          { caller, command: command.type, code: error.code },
          `Command rejected: ${error.message}`,
        );
        this._metrics?.incrementCounter(COMMANDS_METRIC, {
          command: command.type,
          outcome: "rejected",
          code: error.code,
        });
      }
      throw error;
    }

    this._metrics?.incrementCounter(COMMANDS_METRIC, {
      command: command.type,
      outcome: "committed",
    });

    if (READ_COMMANDS.has(command.type)) {
      this._logger.debug({ caller, command: command.type }, "Read served");
      return result;
    }

    const participants = participantsOf(result);
    const detail = describe(command);
    this.auditLog.append({ action: command.type, actor: caller, participants, detail });
    this._logger.info(
      { caller, command: command.type, participants, detail },
      "Command committed",
    );
    return result;
  }

  // ─── Reads ───────────────────────────────────────────────────────

  getLine(p: ParticipantId, q: ParticipantId): TrustLine {
    return this.network.getLine(p, q);
  }

  listLines(participant: ParticipantId): readonly TrustLine[] {
    return this.network.listLines(participant);
  }

  isAdmin(participant: ParticipantId): boolean {
    return this.network.isAdmin(participant);
  }

  get lineCount(): number {
    return this.network.lineCount;
  }

  snapshot(): NetworkSnapshot {
    return this.network.snapshot();
  }
}

// =============================================================================
// Helpers
// =============================================================================

function participantsOf(result: CommandResult): readonly ParticipantId[] {
  switch (result.type) {
    case "ripple": {
      const seen = new Set<ParticipantId>();
      for (const hop of result.hops) {
        seen.add(hop.pair.lo);
        seen.add(hop.pair.hi);
      }
      return [...seen].sort();
    }
    case "balance":
    case "credit":
      return [result.pair.lo, result.pair.hi];
    default:
      return [result.line.pair.lo, result.line.pair.hi];
  }
}

function describe(command: Command): string | undefined {
  switch (command.type) {
    case "create":
      return `limitLo=${command.limitLo.toString()} limitHi=${command.limitHi.toString()}`;
    case "send":
      return `amount=${command.amount.toString()}`;
    case "ripple":
      return `amount=${command.amount.toString()} hops=${command.hops.join(">")}`;
    case "quality":
      return `qualityIn=${String(command.qualityIn)} qualityOut=${String(command.qualityOut)}`;
    case "ripple_set":
      return `allowRippling=${String(command.allowRippling)}`;
    case "limits":
      return `limitLo=${command.limitLo.toString()} limitHi=${command.limitHi.toString()}`;
    case "settle":
      return command.reference !== undefined
        ? `amount=${command.amount.toString()} reference=${command.reference}`
        : `amount=${command.amount.toString()}`;
    default:
      return undefined;
  }
}
