import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../config_loader.errors';
import { GraphValidator } from '../../graph_validator';
import {
  CONFIG_ENV_VAR,
  DEFAULT_TEMPLATE_PATH,
  findWorkflowConfig,
  initWorkflowConfig,
  loadWorkflowConfig,
} from './fs_config_loader';

describe('fs config loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fs-config-loader-test-')));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadWorkflowConfig', () => {
    it('[EARS-FCL01] should read and parse the document', async () => {
      const filePath = path.join(tempDir, 'flowgate_workflow.yml');
      fs.writeFileSync(filePath, 'states: [A, B]\nworkflows: { go: {} }\ntransitions:\n  - { from: A, to: B, via: go }\n');

      const config = await loadWorkflowConfig(filePath);

      expect(config.source).toBe(filePath);
      expect(config.transitions).toHaveLength(1);
    });

    it('[EARS-FCL02] should raise NOT_FOUND for a missing file', async () => {
      const filePath = path.join(tempDir, 'absent.yml');

      await expect(loadWorkflowConfig(filePath)).rejects.toThrow(ConfigError);
      await expect(loadWorkflowConfig(filePath)).rejects.toMatchObject({ kind: 'NOT_FOUND', location: filePath });
    });

    it('[EARS-FCL03] should validate against a companion schema when given', async () => {
      const schemaPath = path.join(tempDir, 'strict.schema.yml');
      fs.writeFileSync(schemaPath, 'type: object\nrequired: [states, workflows, transitions, version]\n');
      const filePath = path.join(tempDir, 'workflow.yml');
      fs.writeFileSync(filePath, 'states: [A]\nworkflows: {}\ntransitions: []\n');

      await expect(loadWorkflowConfig(filePath, { schemaPath })).rejects.toMatchObject({
        kind: 'SCHEMA_VIOLATION',
        location: '/version',
      });
    });
  });

  describe('findWorkflowConfig', () => {
    it('[EARS-FCL04] should find the document in a parent directory', () => {
      const nested = path.join(tempDir, 'packages', 'api');
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, 'flowgate_workflow.yml'), '');

      expect(findWorkflowConfig(nested, {})).toBe(path.join(tempDir, 'flowgate_workflow.yml'));
    });

    it('[EARS-FCL05] should look inside .flowgate/', () => {
      fs.mkdirSync(path.join(tempDir, '.flowgate'));
      fs.writeFileSync(path.join(tempDir, '.flowgate', 'workflow.yml'), '');

      expect(findWorkflowConfig(tempDir, {})).toBe(path.join(tempDir, '.flowgate', 'workflow.yml'));
    });

    it('[EARS-FCL06] should prefer the environment variable', () => {
      fs.writeFileSync(path.join(tempDir, 'flowgate_workflow.yml'), '');

      expect(findWorkflowConfig(tempDir, { [CONFIG_ENV_VAR]: 'custom/workflow.yml' }))
        .toBe(path.join(tempDir, 'custom', 'workflow.yml'));
    });
  });

  describe('initWorkflowConfig', () => {
    it('[EARS-FCL07] should write the bundled lifecycle, which validates cleanly', async () => {
      const written = await initWorkflowConfig(tempDir);

      expect(written).toBe(path.join(tempDir, 'flowgate_workflow.yml'));
      expect(fs.readFileSync(written, 'utf-8')).toBe(fs.readFileSync(DEFAULT_TEMPLATE_PATH, 'utf-8'));

      const config = await loadWorkflowConfig(written);
      expect(config.states).toHaveLength(9);
      expect(new GraphValidator().validate(config)).toEqual({ isValid: true, errors: [], warnings: [] });
    });

    it('[EARS-FCL08] should refuse to overwrite unless forced', async () => {
      const target = path.join(tempDir, 'flowgate_workflow.yml');
      fs.writeFileSync(target, 'custom');

      await expect(initWorkflowConfig(tempDir)).rejects.toMatchObject({ code: 'CONFIG_EXISTS' });
      expect(fs.readFileSync(target, 'utf-8')).toBe('custom');

      await initWorkflowConfig(tempDir, { force: true });
      expect(fs.readFileSync(target, 'utf-8')).not.toBe('custom');
    });
  });
});
