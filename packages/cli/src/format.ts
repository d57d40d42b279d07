/**
 * @chronostamp/cli — Proof tree rendering.
 *
 * Single-child chains are printed flat; a node with several operations
 * opens one ` -> ` branch per operation, indented by four. With verbose
 * output each operation shows its result, the argument highlighted.
 */

import { Chalk, type ChalkInstance } from "chalk";
import {
  chainLabel,
  formatAttestation,
  formatOp,
  isBinaryOp,
  toHex,
  toReversedHex,
  type Op,
  type Timestamp,
} from "@chronostamp/proof";

export interface FormatTreeOptions {
  readonly verbose?: boolean | undefined;
  readonly chalk?: ChalkInstance | undefined;
}

const defaultChalk = new Chalk();

function showResult(
  op: Op,
  result: Uint8Array,
  verbose: boolean,
  chalk: ChalkInstance,
): string {
  if (!verbose) return "";
  const resultHex = toHex(result);
  if (!isBinaryOp(op)) return ` == ${resultHex}`;

  const argHex = toHex(op.arg);
  const index = resultHex.indexOf(argHex);
  if (index === -1) return ` == ${resultHex}`;
  if (index === 0) return ` == ${chalk.bold(argHex)}${resultHex.slice(argHex.length)}`;
  return ` == ${resultHex.slice(0, index)}${chalk.bold(argHex)}`;
}

function renderNode(
  stamp: Timestamp,
  indent: number,
  verbose: boolean,
  chalk: ChalkInstance,
  lines: string[],
): void {
  const pad = " ".repeat(indent);

  for (const attestation of stamp.attestations) {
    lines.push(`${pad}verify ${chalk.green(formatAttestation(attestation))}`);
    if (attestation.kind === "block-header") {
      lines.push(`${pad}${chalk.gray(`# ${chainLabel(attestation.chain)} block merkle root ${toReversedHex(stamp.msg)}`)}`);
    }
  }

  const ops = stamp.ops;
  if (ops.length > 1) {
    for (const { op, stamp: child } of ops) {
      lines.push(`${pad} -> ${formatOp(op)}${showResult(op, child.msg, verbose, chalk)}`);
      renderNode(child, indent + 4, verbose, chalk, lines);
    }
  } else {
    for (const { op, stamp: child } of ops) {
      lines.push(`${pad}${formatOp(op)}${showResult(op, child.msg, verbose, chalk)}`);
      renderNode(child, indent, verbose, chalk, lines);
    }
  }
}

/** Render the proof DAG below `stamp`, one line per entry. */
export function formatTree(stamp: Timestamp, options: FormatTreeOptions = {}): string {
  const lines: string[] = [];
  renderNode(stamp, 0, options.verbose ?? false, options.chalk ?? defaultChalk, lines);
  return lines.join("\n");
}

export function formatUnixTime(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
