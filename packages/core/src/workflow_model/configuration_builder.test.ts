import { ConfigError } from '../config_loader/config_loader.errors';
import { ConfigurationBuilder } from './configuration_builder';

describe('ConfigurationBuilder', () => {
  function minimalBuilder(): ConfigurationBuilder {
    return new ConfigurationBuilder({ version: '1.0', source: 'workflow.yml' })
      .addState('To Do')
      .addState({ name: 'Done', description: 'Finished' })
      .addWorkflow({ name: 'finish', agents: ['release-manager'] })
      .addTransition({ from: 'To Do', to: 'Done', via: 'finish' });
  }

  it('[EARS-CB01] should build a frozen configuration with defaults applied', () => {
    const config = minimalBuilder().build();

    expect(config.version).toBe('1.0');
    expect(config.source).toBe('workflow.yml');
    expect(config.states).toEqual([
      { name: 'To Do', description: '' },
      { name: 'Done', description: 'Finished' },
    ]);
    expect(config.workflows[0]).toEqual({
      name: 'finish',
      command: '/flow:finish',
      description: '',
      agentReferences: ['release-manager'],
      loop: 'outer',
    });
    expect(config.transitions[0]).toEqual({
      name: 'finish',
      from: ['To Do'],
      to: 'Done',
      via: 'finish',
      validationMode: { kind: 'none' },
      inputArtifacts: [],
      outputArtifacts: [],
      description: '',
    });
    expect(config.initialStates).toBeNull();
    expect(config.policy.acceptanceCriteria).toBe('advisory');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.transitions)).toBe(true);
  });

  it('[EARS-CB02] should apply artifact defaults and parse validation notation', () => {
    const config = new ConfigurationBuilder()
      .addState('Planned')
      .addState('In Implementation')
      .addTransition({
        from: ['Planned'],
        to: 'In Implementation',
        via: 'implement',
        validation: 'KEYWORD["CONFIRM"]',
        outputArtifacts: [{ type: 'code', path: './src/', multiple: true }],
      })
      .build();

    expect(config.transitions[0]?.validationMode).toEqual({ kind: 'keyword', keyword: 'CONFIRM' });
    expect(config.transitions[0]?.outputArtifacts).toEqual([
      { type: 'code', pathPattern: './src/', required: true, multiple: true },
    ]);
  });

  it('[EARS-CB03] should reject duplicate state names with their location', () => {
    const builder = new ConfigurationBuilder().addState('To Do');

    expect(() => builder.addState('To Do')).toThrow(ConfigError);
    try {
      builder.addState('To Do');
    } catch (error) {
      expect(error).toMatchObject({ kind: 'SCHEMA_VIOLATION', location: '/states/1' });
    }
  });

  it('[EARS-CB04] should reject an unknown validation mode', () => {
    const builder = new ConfigurationBuilder().addState('A').addState('B');

    expect(() => builder.addTransition({ from: 'A', to: 'B', via: 'go', validation: 'MANUAL' }))
      .toThrow(expect.objectContaining({ kind: 'SCHEMA_VIOLATION', location: '/transitions/0/validation' }));
  });

  it('[EARS-CB05] should reject an empty source list and an empty keyword', () => {
    const builder = new ConfigurationBuilder().addState('A').addState('B');

    expect(() => builder.addTransition({ from: [], to: 'B', via: 'go' }))
      .toThrow(expect.objectContaining({ location: '/transitions/0/from' }));
    expect(() => builder.addTransition({ from: 'A', to: 'B', via: 'go', validation: { kind: 'keyword', keyword: ' ' } }))
      .toThrow(expect.objectContaining({ location: '/transitions/0/validation/keyword' }));
  });

  it('[EARS-CB06] should refuse to build without states', () => {
    expect(() => new ConfigurationBuilder().build())
      .toThrow(expect.objectContaining({ kind: 'SCHEMA_VIOLATION', location: '/states' }));
  });

  it('[EARS-CB07] should keep references to undeclared states for the graph validator', () => {
    const config = new ConfigurationBuilder()
      .addState('A')
      .addTransition({ from: 'A', to: 'Ghost', via: 'haunt' })
      .build();

    expect(config.transitions[0]?.to).toBe('Ghost');
  });

  it('[EARS-CB08] should record explicit initial states, agent loops and known agents', () => {
    const config = minimalBuilder()
      .setInitialStates(['To Do'])
      .setAgentLoops({ inner: ['quality-guardian'], outer: ['release-manager'] })
      .addKnownAgents(['custom-agent', 'custom-agent'])
      .setAcceptanceCriteriaPolicy('blocking')
      .build();

    expect(config.initialStates).toEqual(['To Do']);
    expect(config.agentLoops).toEqual({ inner: ['quality-guardian'], outer: ['release-manager'] });
    expect(config.knownAgents).toEqual(['custom-agent']);
    expect(config.policy.acceptanceCriteria).toBe('blocking');
  });

  it('[EARS-CB09] should collapse repeated source states', () => {
    const config = new ConfigurationBuilder()
      .addState('A')
      .addState('B')
      .addTransition({ from: ['A', 'A'], to: 'B', via: 'go' })
      .build();

    expect(config.transitions[0]?.from).toEqual(['A']);
  });

  it('[EARS-CB10] should reject artifact paths that leave the project root', () => {
    const builder = new ConfigurationBuilder().addState('A').addState('B');

    expect(() => builder.addTransition({
      from: 'A',
      to: 'B',
      via: 'go',
      outputArtifacts: [{ type: 'report', path: '../shared/report.md' }],
    })).toThrow(expect.objectContaining({
      kind: 'SCHEMA_VIOLATION',
      location: '/transitions/0/output_artifacts/0/path',
      message: expect.stringContaining("Artifact path '../shared/report.md' must stay inside the project root"),
    }));
    expect(() => builder.addTransition({
      from: 'A',
      to: 'B',
      via: 'go',
      inputArtifacts: [{ type: 'report', path: '/tmp/report.md' }],
    })).toThrow(expect.objectContaining({ location: '/transitions/0/input_artifacts/0/path' }));
  });

  it('[EARS-CB11] should keep the approval keyword as written in both notations', () => {
    const config = new ConfigurationBuilder()
      .addState('A')
      .addState('B')
      .addState('C')
      .addTransition({ from: 'A', to: 'B', via: 'go', validation: 'KEYWORD[" GO "]' })
      .addTransition({ from: 'B', to: 'C', via: 'ship', validation: { kind: 'keyword', keyword: ' GO ' } })
      .build();

    expect(config.transitions.map(transition => transition.validationMode)).toEqual([
      { kind: 'keyword', keyword: ' GO ' },
      { kind: 'keyword', keyword: ' GO ' },
    ]);
  });
});
