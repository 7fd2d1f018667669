#!/usr/bin/env node
import { runCli } from './src/cli';
import { loadPdfDocument } from './src/pdf/load';

runCli(process.argv.slice(2), {
  loadPdf: loadPdfDocument,
  stdout: (text) => {
    process.stdout.write(text);
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[StructureLinker] unexpected failure', { err });
    process.exitCode = 1;
  });
