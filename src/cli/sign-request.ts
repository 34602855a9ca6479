/**
 * Builds a signed request envelope for the HTTP API.
 *
 * Usage:
 *   SIGNER_PRIVATE_KEY=<hex> SIGNER_PUBLIC_KEY=<hex> \
 *     npm run sign-request -- <action> key=value [key=value ...]
 *
 * Prints the JSON envelope to stdout, ready to POST.
 */

import * as dotenv from 'dotenv';
import { API_ACTIONS } from '../operator/api-server';
import { RequestBody, signRequest } from '../operator/request-auth';

dotenv.config();

const ACTIONS: string[] = Object.values(API_ACTIONS);

function main(argv: string[]): number {
  const [action, ...pairs] = argv;
  if (!action || !ACTIONS.includes(action)) {
    console.error(`Usage: sign-request <action> key=value ...\nActions: ${ACTIONS.join(', ')}`);
    return 1;
  }

  const privateKey = (process.env.SIGNER_PRIVATE_KEY || '').trim();
  const publicKey = (process.env.SIGNER_PUBLIC_KEY || '').trim();
  if (!privateKey || !publicKey) {
    console.error('SIGNER_PRIVATE_KEY and SIGNER_PUBLIC_KEY must be set');
    return 1;
  }

  const body: RequestBody = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      console.error(`Expected key=value, got "${pair}"`);
      return 1;
    }
    body[pair.slice(0, eq)] = pair.slice(eq + 1);
  }

  console.log(JSON.stringify(signRequest(action, body, { privateKey, publicKey }), null, 2));
  return 0;
}

process.exitCode = main(process.argv.slice(2));
