import fs from 'fs';
import path from 'path';
import { Operation, ReplayResult, operationSchema } from '../model/Operation';
import { Log, Warn } from '../utils/Logger';
import { JsonBigIntReplacer, JsonBigIntReviver } from '../utils/Utils';
import { ParseWithSchema } from '../utils/Validation';
import { ManualClock } from './Clock';
import { GaugeSystem } from './GaugeSystem';

/**
 * Append-only JSON lines log of ledger operations. Replaying it on a fresh
 * system, with the clock moved to each operation's timestamp, rebuilds the
 * ledger state.
 */
export class OperationJournal {
  readonly filename: string;
  // operations already applied from the file
  private position = 0;

  constructor(filename: string) {
    this.filename = filename;
  }

  load(): Operation[] {
    if (!fs.existsSync(this.filename)) {
      return [];
    }
    const lines = fs.readFileSync(this.filename, 'utf-8').split('\n');
    const operations: Operation[] = [];
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line.length == 0) {
        continue;
      }
      try {
        operations.push(parseOperation(JSON.parse(line, JsonBigIntReviver)));
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new Error(`OperationJournal: invalid line ${i + 1} of ${this.filename}: ${reason}`);
      }
    }
    return operations;
  }

  /**
   * Apply an operation submitted by this process and journal it when the
   * ledger accepts it. Lines other writers appended are applied first, so the
   * operation lands in the journal in the order it was applied.
   */
  submit(system: GaugeSystem, clock: ManualClock, operation: Operation): ReplayResult {
    this.applyNew(system, clock);
    const result = applyOperation(system, clock, operation, this.position + 1);
    if (result.ok) {
      this.append(operation);
    }
    return result;
  }

  /**
   * Apply the operations appended since the last call, all of them on the
   * first call. A rejected operation is reported and skipped, as it was when
   * it was first submitted.
   */
  applyNew(system: GaugeSystem, clock: ManualClock): ReplayResult[] {
    const operations = this.load();
    const results: ReplayResult[] = [];
    for (let i = this.position; i < operations.length; i++) {
      results.push(applyOperation(system, clock, operations[i], i + 1));
    }
    this.position = Math.max(this.position, operations.length);
    if (results.length > 0) {
      const failed = results.filter((_) => !_.ok).length;
      Log(`OperationJournal: applied ${results.length} operations, ${failed} rejected`);
    }
    return results;
  }

  private append(operation: Operation) {
    if (!fs.existsSync(path.dirname(this.filename))) {
      fs.mkdirSync(path.dirname(this.filename), { recursive: true });
    }
    fs.appendFileSync(this.filename, JSON.stringify(operation, JsonBigIntReplacer) + '\n');
    this.position++;
  }
}

export function applyOperation(system: GaugeSystem, clock: ManualClock, operation: Operation, line = 0): ReplayResult {
  clock.advanceTo(operation.timestamp);
  try {
    execute(system, operation);
    return { line, op: operation.op, ok: true };
  } catch (e) {
    const error = e instanceof Error ? e.message : String(e);
    Warn(`OperationJournal: ${operation.op} at line ${line} rejected: ${error}`);
    return { line, op: operation.op, ok: false, error };
  }
}

function execute(system: GaugeSystem, operation: Operation) {
  switch (operation.op) {
    case 'addGauge':
      system.registry.addGauge(operation.caller, operation.gaugeType, operation.gauge);
      break;
    case 'removeGauge':
      system.registry.removeGauge(operation.caller, operation.gauge);
      break;
    case 'setMaxGauges':
      system.weights.setMaxGauges(operation.caller, operation.maxGauges);
      break;
    case 'setExempt':
      system.weights.setExempt(operation.caller, operation.account, operation.exempt);
      break;
    case 'mint':
      system.token.mint(operation.caller, operation.to, operation.amount);
      break;
    case 'minterMint':
      system.minter.mint(operation.caller, operation.to, operation.amount);
      break;
    case 'burn':
      system.token.burn(operation.user, operation.amount);
      break;
    case 'transfer':
      system.token.transfer(operation.from, operation.to, operation.amount);
      break;
    case 'transferFrom':
      system.token.transferFrom(operation.spender, operation.from, operation.to, operation.amount);
      break;
    case 'approve':
      system.token.approve(operation.owner, operation.spender, operation.amount);
      break;
    case 'enableTransfer':
      system.token.enableTransfer(operation.caller);
      break;
    case 'incrementWeight':
      system.weights.incrementWeight(operation.user, operation.gauge, operation.amount);
      break;
    case 'incrementWeights':
      system.weights.incrementWeights(operation.user, operation.gauges, operation.amounts);
      break;
    case 'decrementWeight':
      system.weights.decrementWeight(operation.user, operation.gauge, operation.amount);
      break;
    case 'decrementWeights':
      system.weights.decrementWeights(operation.user, operation.gauges, operation.amounts);
      break;
    case 'reportLoss':
      system.losses.reportLoss(operation.caller, operation.gauge);
      break;
    case 'applyLoss':
      system.losses.applyLoss(operation.gauge, operation.user);
      break;
    case 'delegate':
      system.delegation.delegate(operation.delegator, operation.delegatee);
      break;
    case 'incrementDelegation':
      system.delegation.incrementDelegation(operation.delegator, operation.delegatee, operation.amount);
      break;
    case 'undelegate':
      system.delegation.undelegate(operation.delegator, operation.delegatee, operation.amount);
      break;
  }
}

export function parseOperation(raw: unknown): Operation {
  return ParseWithSchema(operationSchema, raw, 'operation');
}
