type CheckKey =
  | 'roomsDisjoint'
  | 'playerPlaced'
  | 'confusionRestored';

type CheckStatus = 'unknown' | 'pass' | 'fail';

const CHECK_LABELS: Record<CheckKey, string> = {
  roomsDisjoint: 'Accepted rooms never intersect',
  playerPlaced: 'Player starts inside the first room',
  confusionRestored: 'Confused monsters return to their previous behaviour',
};

const checkState: Record<CheckKey, CheckStatus> = {
  roomsDisjoint: 'unknown',
  playerPlaced: 'unknown',
  confusionRestored: 'unknown',
};

let enabled = true;

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

/** Throws on a broken internal invariant. Never caught inside the simulation. */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

export function setChecksEnabled(value: boolean): void {
  enabled = value;
}

export function getCheckStatus(key: CheckKey): CheckStatus {
  return checkState[key];
}

function log(status: 'PASS' | 'FAIL', message: string): void {
  if (!enabled) {
    return;
  }
  const prefix = status === 'PASS' ? '[PASS]' : '[FAIL]';
  if (status === 'PASS') {
    console.log(`${prefix} ${message}`);
  } else {
    console.error(`${prefix} ${message}`);
  }
}

export function reportCheckPass(key: CheckKey, detail?: string): void {
  if (checkState[key] === 'fail' || checkState[key] === 'pass') {
    return;
  }
  const label = CHECK_LABELS[key];
  const message = detail ? `${label} (${detail})` : label;
  log('PASS', message);
  checkState[key] = 'pass';
}

export function reportCheckFail(key: CheckKey, detail?: string): void {
  if (checkState[key] === 'fail') {
    return;
  }
  const label = CHECK_LABELS[key];
  const message = detail ? `${label} (${detail})` : label;
  log('FAIL', message);
  checkState[key] = 'fail';
}

export type { CheckKey, CheckStatus };
