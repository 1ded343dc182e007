#!/usr/bin/env node
import { main } from '../lib/cli';

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
}).catch(e => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exitCode = 1;
});
