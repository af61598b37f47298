#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { mintToken } from '../src/auth.js';
import { loadConfig } from '../src/config.js';

const main = async () => {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('mint-token')
    .usage('$0 [options]')
    .option('subject', {
      type: 'string',
      alias: 's',
      describe: 'Subject (sub) to embed in the token',
      demandOption: true,
    })
    .option('scope', {
      type: 'string',
      alias: 'S',
      describe: 'Scopes, space or comma separated',
      default: 'league:write',
    })
    .option('expires-in', {
      type: 'number',
      alias: 'e',
      describe: 'Lifetime in seconds',
      default: 3600,
    })
    .help()
    .parseAsync();

  const config = loadConfig();
  const { token, payload } = mintToken(config.auth, {
    subject: argv.subject,
    scopes: argv.scope.split(/[\s,]+/).filter(Boolean),
    expiresInSeconds: argv.expiresIn,
  });

  console.log(
    JSON.stringify(
      {
        token,
        payload,
        expiresAt: payload.exp ? new Date(payload.exp * 1000).toISOString() : null,
      },
      null,
      2
    )
  );
};

main().catch((err) => {
  console.error('mint_token_failed', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
