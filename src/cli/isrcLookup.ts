#!/usr/bin/env node
/**
 * Usage:
 *   isrc-lookup tracks.xlsx --column ISRC --out results.xlsx
 *   isrc-lookup USUG11904257 GBUM71029604 --format json
 *   isrc-lookup --interactive
 *
 * Writes a report with release year, track, artist and album for each ISRC.
 */

import { errorMessage } from '../lib/errors';
import { main } from '../lib/runIsrcLookup';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
