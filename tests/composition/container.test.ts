import fs from 'fs';
import path from 'path';
import { createWorkbenchContext } from '../../src/composition/container';
import { OpenAiToolGenerator } from '../../src/adapters/tools/OpenAiToolGenerator';
import { makeLogger, makeTempDir, removeDir } from '../helpers/fakes';

describe('createWorkbenchContext', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => removeDir(dir));

  test('explicit options win over the config file', () => {
    const configPath = path.join(dir, 'flowsmith.config.json');
    fs.writeFileSync(configPath, JSON.stringify({ toolsDir: 'cfg-tools', flowsDir: 'cfg-flows', logDir: 'cfg-logs' }));

    const context = createWorkbenchContext({
      configPath,
      flowsDir: path.join(dir, 'explicit-flows'),
      generator: null,
      logger: makeLogger(),
    });

    expect(context.toolsDir).toBe(path.join(dir, 'cfg-tools'));
    expect(context.flowsDir).toBe(path.join(dir, 'explicit-flows'));
    expect(context.logDir).toBe(path.join(dir, 'cfg-logs'));
    expect(fs.statSync(context.toolsDir).isDirectory()).toBe(true);
    expect(context.generator).toBeNull();
  });

  test('loads existing tools and flows', () => {
    const toolsDir = path.join(dir, 'tools');
    const flowsDir = path.join(dir, 'flows');
    fs.mkdirSync(toolsDir);
    fs.mkdirSync(flowsDir);
    fs.writeFileSync(path.join(toolsDir, 'echo.ts'), 'export function echo(value: unknown) {\n  return value;\n}\n');
    fs.writeFileSync(path.join(flowsDir, 'repeat.json'), JSON.stringify({ name: 'repeat', steps: [{ tool: 'echo' }] }));

    const context = createWorkbenchContext({
      toolsDir,
      flowsDir,
      logDir: path.join(dir, 'logs'),
      useConfigFile: false,
      generator: null,
      logger: makeLogger(),
    });

    expect(context.tools.list()).toEqual(['echo']);
    expect(context.flows.list()).toEqual(['repeat']);
    expect(context.engine.describe('repeat').steps[0].id).toBe('step_1');
  });

  test('uses the OpenAI generator unless one is given', () => {
    const context = createWorkbenchContext({
      toolsDir: path.join(dir, 'tools'),
      flowsDir: path.join(dir, 'flows'),
      logDir: path.join(dir, 'logs'),
      useConfigFile: false,
      logger: makeLogger(),
    });
    expect(context.generator).toBeInstanceOf(OpenAiToolGenerator);
  });
});
