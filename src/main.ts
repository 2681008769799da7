#!/usr/bin/env node
import 'reflect-metadata';
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { WorkflowRunOptions } from './modules/workflow/interfaces/execution.interfaces';
import { ParameterOverrides } from './modules/workflow/interfaces/workflow.interfaces';
import { WorkflowRunnerService } from './modules/workflow/services/workflow-runner.service';
import { isPlainObject } from './modules/workflow/utils/record.utils';

const USAGE =
  'Usage: ledgerflow <workflow.json> [input.json] [--overrides overrides.json] ' +
  '[--timeout ms] [--mode sequential|parallel] [--terminal nodeId] [--list-nodes]';

async function readJson(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf8');
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

async function bootstrap(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      overrides: { type: 'string' },
      timeout: { type: 'string' },
      mode: { type: 'string' },
      terminal: { type: 'string' },
      'list-nodes': { type: 'boolean' },
    },
  });

  const logLevels: LogLevel[] =
    process.env.NODE_ENV === 'production' ? ['warn', 'error'] : ['log', 'warn', 'error'];
  const app = await NestFactory.createApplicationContext(AppModule, { logger: logLevels });

  try {
    const runner = app.get(WorkflowRunnerService);

    if (values['list-nodes']) {
      process.stdout.write(`${JSON.stringify(runner.listNodes(), null, 2)}\n`);
      return 0;
    }

    const [workflowPath, inputPath] = positionals;
    if (!workflowPath) {
      new Logger('Bootstrap').error(USAGE);
      return 2;
    }

    const options: WorkflowRunOptions = {};
    if (values.overrides) {
      const overrides = await readJson(values.overrides);
      if (!isPlainObject(overrides)) {
        throw new Error('Overrides file must contain a JSON object');
      }
      const parsed: ParameterOverrides = {};
      for (const [nodeId, parameters] of Object.entries(overrides)) {
        if (isPlainObject(parameters)) {
          parsed[nodeId] = parameters;
        }
      }
      options.overrides = parsed;
    }
    if (values.timeout) {
      options.timeoutMs = Number(values.timeout);
    }
    if (values.mode === 'sequential' || values.mode === 'parallel') {
      options.executionMode = values.mode;
    }
    if (values.terminal) {
      options.terminalNodeId = values.terminal;
    }

    const definition = await readJson(workflowPath);
    const input = inputPath ? await readJson(inputPath) : undefined;
    const result = await runner.run(definition, input, options);

    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    return result.status === 'success' ? 0 : 1;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err) => {
    console.error('Error during bootstrap:', err);
    process.exit(1);
  });
