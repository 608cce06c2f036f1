import { randomUUID } from 'node:crypto';
import { DependencyGraph } from './dependency-graph';
import { CyclicDependencyError, DanglingDependencyError, DuplicateStepNameError } from './errors';
import { Pipeline } from './pipeline';
import { PipelineStep } from './pipeline-step';
import { InstantiateOptions, PipelineStage, ResolutionPolicy, StepDefinition } from './pipeline.types';
import { bindVariables, mergeVariables } from './variable-binder';

export interface PipelineTemplateInit {
  id?: string;
  name: string;
  description?: string;
  steps?: readonly StepDefinition[];
}

/**
 * Reusable, ordered catalog of step blueprints. Instantiation never mutates the
 * template, so one template can back any number of pipelines.
 */
export class PipelineTemplate {
  readonly id: string;
  readonly name: string;
  readonly description: string;

  private readonly _steps: StepDefinition[] = [];

  constructor(init: PipelineTemplateInit) {
    this.id = init.id ?? randomUUID();
    this.name = init.name;
    this.description = init.description ?? '';
    for (const step of init.steps ?? []) {
      this.addStep(step.name, step.stage, step.commandTemplate, step.dependsOn);
    }
  }

  get steps(): readonly StepDefinition[] {
    return this._steps;
  }

  addStep(
    name: string,
    stage: PipelineStage,
    commandTemplate: string,
    dependsOn: readonly string[] = [],
  ): this {
    if (this._steps.some((step) => step.name === name)) {
      throw new DuplicateStepNameError(name);
    }
    this._steps.push(
      Object.freeze({ name, stage, commandTemplate, dependsOn: Object.freeze([...dependsOn]) }),
    );
    return this;
  }

  /**
   * Check the dependency graph: dangling names throw under `strict`,
   * cycles always throw. Returns a valid execution order of step names.
   */
  validate(dependencyPolicy: ResolutionPolicy = 'permissive'): string[] {
    if (dependencyPolicy === 'strict') {
      const declared = new Set(this._steps.map((step) => step.name));
      for (const step of this._steps) {
        const dangling = step.dependsOn.find((dep) => !declared.has(dep));
        if (dangling !== undefined) throw new DanglingDependencyError(step.name, dangling);
      }
    }

    const graph = new DependencyGraph(this._steps);
    const order = graph.topologicalOrder();
    if (order === null) {
      throw new CyclicDependencyError(graph.findCycle() ?? []);
    }
    return order;
  }

  /**
   * Build a concrete pipeline. `APP_ID` and `VERSION` are bound from the
   * arguments and win over caller variables with the same names.
   */
  instantiate(
    subjectId: string,
    version: string,
    variables: Readonly<Record<string, string>> = {},
    options: InstantiateOptions = {},
  ): Pipeline {
    this.validate(options.dependencyPolicy);

    const bindings = mergeVariables(variables, { APP_ID: subjectId, VERSION: version });
    const strict = options.variablePolicy === 'strict';
    const pipeline = new Pipeline({
      templateId: this.id,
      templateName: this.name,
      subjectId,
      version,
    });

    const idsByName = new Map<string, string>();
    const created: PipelineStep[] = [];
    for (const definition of this._steps) {
      const step = new PipelineStep({
        name: definition.name,
        stage: definition.stage,
        command: bindVariables(definition.commandTemplate, bindings, { strict }),
      });
      pipeline.addStep(step);
      idsByName.set(definition.name, step.id);
      created.push(step);
    }

    // second pass: every id exists now
    this._steps.forEach((definition, index) => {
      const ids = new Set<string>();
      for (const name of definition.dependsOn) {
        const id = idsByName.get(name);
        if (id !== undefined) ids.add(id);
      }
      created[index].setDependencies([...ids]);
    });

    return pipeline;
  }
}
