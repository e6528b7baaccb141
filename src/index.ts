#!/usr/bin/env node
/**
 * Registry CLI - Main Entry Point
 * Grade lookup, transcripts, academic clearance and graduation exports
 * over the local registry database
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, parseTermList, type AppConfig } from './config.js';
import { RegistryDatabase } from './db/database.js';
import { approveAcademicGraduation } from './commands/approve.js';
import { checkPrerequisites, formatPrerequisiteReport } from './commands/checkPrerequisites.js';
import { evaluateClearance, formatClearance } from './commands/clearance.js';
import { collectGraduatingStudents, writeGraduatingExport } from './commands/exportGraduating.js';
import { formatGradeLookup, lookupGrade, lookupMarks } from './commands/grade.js';
import { importSnapshotFile } from './commands/importSnapshot.js';
import { buildTranscript, formatTranscript } from './commands/transcript.js';
import { updateGrades } from './commands/updateGrades.js';
import { LogLevel, logger } from './logger.js';

type GlobalOptions = {
  db?: string;
  verbose?: boolean;
};

function parseStdNo(value: string): number {
  const stdNo = Number(value);
  if (!Number.isInteger(stdNo) || stdNo <= 0) {
    throw new InvalidArgumentError('Student number must be a positive integer.');
  }
  return stdNo;
}

function print(lines: string[]) {
  for (const line of lines) console.log(line);
}

let appConfig: AppConfig | undefined;

function getConfig(): AppConfig {
  appConfig ??= loadConfig();
  return appConfig;
}

/**
 * Open the database for one command and close it afterwards
 */
function withDatabase(command: Command, run: (db: RegistryDatabase, config: AppConfig) => void) {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = getConfig();
  const db = new RegistryDatabase(options.db ?? config.dbPath);

  try {
    db.initialize();
    run(db, config);
  } finally {
    db.close();
  }
}

const program = new Command();

program
  .name('registry')
  .description('University registry back-office: grades, CGPA, clearance and graduation')
  .version('1.0.0')
  .option('--db <path>', 'SQLite database path (overrides REGISTRY_DB_PATH)')
  .option('-v, --verbose', 'Verbose output');

program.hook('preAction', (thisCommand) => {
  const config = getConfig();
  logger.setLevel(thisCommand.opts<GlobalOptions>().verbose ? LogLevel.DEBUG : config.logLevel);
  if (config.logToFile) {
    logger.startSession(config.logDir);
  }
});

program
  .command('grade')
  .description('Show a catalog grade, or the grade a mark earns')
  .argument('[symbol]', 'grade symbol, e.g. B+')
  .option('-m, --marks <n>', 'numeric mark to convert')
  .action((symbol: string | undefined, options: { marks?: string }) => {
    if (options.marks !== undefined) {
      print(formatGradeLookup(lookupMarks(options.marks)));
    } else if (symbol !== undefined) {
      print(formatGradeLookup(lookupGrade(symbol)));
    } else {
      program.error('grade needs a symbol or --marks <n>');
    }
  });

program
  .command('transcript')
  .description('Per-semester GPA and CGPA with the final classification')
  .argument('<stdNo>', 'student number', parseStdNo)
  .action((stdNo: number, _options: unknown, command: Command) => {
    withDatabase(command, db => print(formatTranscript(buildTranscript(db, stdNo))));
  });

program
  .command('clearance')
  .description('Outstanding modules and the academic clearance decision (read-only)')
  .argument('<stdNo>', 'student number', parseStdNo)
  .action((stdNo: number, _options: unknown, command: Command) => {
    withDatabase(command, db => print(formatClearance(evaluateClearance(db, stdNo))));
  });

program
  .command('approve')
  .description('Re-evaluate every pending academic graduation clearance')
  .action((_options: unknown, command: Command) => {
    withDatabase(command, db => {
      approveAcademicGraduation(db);
    });
  });

program
  .command('check-prerequisites')
  .description('Registration requests in the active term with failed prerequisites')
  .action((_options: unknown, command: Command) => {
    withDatabase(command, db => print(formatPrerequisiteReport(checkPrerequisites(db))));
  });

program
  .command('export-graduating')
  .description('Export graduating students to JSON')
  .option('-t, --terms <list>', 'comma-separated graduation terms (overrides GRADUATION_TERMS)')
  .action((options: { terms?: string }, command: Command) => {
    withDatabase(command, (db, config) => {
      const graduationTerms = options.terms !== undefined ? parseTermList(options.terms) : config.graduationTerms;
      const result = collectGraduatingStudents(db, { graduationTerms });
      if (result.students.length === 0) {
        logger.warn('Export', `No graduating students found (${result.failed} failed)`);
        return;
      }
      writeGraduatingExport(result, config.exportDir);
      logger.summary('Graduating Students', { 'Total': result.students.length, ...result.byProgram, 'Failed': result.failed });
    });
  });

program
  .command('update-grades')
  .description('Recompute grades from recorded marks and correct mismatches')
  .option('--dry-run', 'report mismatches without writing')
  .action((options: { dryRun?: boolean }, command: Command) => {
    withDatabase(command, db => {
      updateGrades(db, { dryRun: options.dryRun });
    });
  });

program
  .command('import')
  .description('Load a JSON registry snapshot')
  .argument('<file>', 'snapshot file')
  .action((file: string, _options: unknown, command: Command) => {
    withDatabase(command, db => {
      importSnapshotFile(db, file);
    });
  });

program
  .command('stats')
  .description('Row counts of the local database')
  .action((_options: unknown, command: Command) => {
    withDatabase(command, (db, config) => {
      const stats = db.getStats();
      const dbPath = command.optsWithGlobals<GlobalOptions>().db ?? config.dbPath;

      console.log('\n' + '='.repeat(50));
      console.log('📊 Registry Database');
      console.log('='.repeat(50));
      console.log(`  Students:           ${stats.students}`);
      console.log(`  Programs:           ${stats.programs}`);
      console.log(`  Modules:            ${stats.modules}`);
      console.log(`  Module attempts:    ${stats.attempts}`);
      console.log(`  Pending clearances: ${stats.pendingClearances}`);
      console.log(`  Database:           ${dbPath}`);
      console.log('='.repeat(50));
    });
  });

try {
  program.parse();
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  console.error('❌ Registry error:', message);
  if (program.opts<GlobalOptions>().verbose && error instanceof Error) {
    console.error(error.stack);
  }
  process.exitCode = 1;
} finally {
  logger.flush();
}
