import { Response } from 'express';
import { LedgerErrorCode, isLedgerError } from '../../model/Errors';
import { Err } from '../../utils/Logger';

// bad addresses are the caller's fault, anything else is ours
export function sendError(res: Response, error: unknown) {
  if (isLedgerError(error, LedgerErrorCode.InvalidAddress)) {
    res.status(400).json({ error: 'Bad request', msg: error.message });
    return;
  }
  Err('Api: request failed', error);
  res.status(500).json({ error: 'Internal server error', msg: error instanceof Error ? error.message : String(error) });
}
