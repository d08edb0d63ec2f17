export type ErrorStage = 'config' | 'load' | 'evaluate' | 'aggregate' | 'run';

export class DecisionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DecisionError';
  }
}

export class ConfigError extends DecisionError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ScenarioError extends DecisionError {
  constructor(message: string, public readonly source: string, cause?: Error) {
    super(message, 'SCENARIO_ERROR', 'load', cause);
    this.name = 'ScenarioError';
  }
}

// ===== Graph =====

export class DuplicateNodeError extends DecisionError {
  constructor(public readonly nodeId: string) {
    super(`Node already exists: ${nodeId}`, 'DUPLICATE_NODE', 'load');
    this.name = 'DuplicateNodeError';
  }
}

export class UnknownNodeTypeError extends DecisionError {
  constructor(public readonly nodeId: string, public readonly nodeType: string) {
    super(`Node ${nodeId} has unknown type: ${nodeType}`, 'UNKNOWN_NODE_TYPE', 'load');
    this.name = 'UnknownNodeTypeError';
  }
}

export class DanglingEdgeError extends DecisionError {
  constructor(
    public readonly sourceId: string,
    public readonly targetId: string,
    public readonly missingId: string,
  ) {
    super(
      `Edge ${sourceId} -> ${targetId} references missing node: ${missingId}`,
      'DANGLING_EDGE',
      'load',
    );
    this.name = 'DanglingEdgeError';
  }
}

export class SelfLoopError extends DecisionError {
  constructor(public readonly nodeId: string) {
    super(`Self-loop edges are not allowed: ${nodeId} -> ${nodeId}`, 'SELF_LOOP', 'load');
    this.name = 'SelfLoopError';
  }
}

export class UnknownRelationError extends DecisionError {
  constructor(public readonly relation: string, detail?: string) {
    super(
      `Unknown relation: ${relation}${detail ? ` (${detail})` : ''}`,
      'UNKNOWN_RELATION',
      'load',
    );
    this.name = 'UnknownRelationError';
  }
}

export class InvalidEdgeWeightError extends DecisionError {
  constructor(
    public readonly sourceId: string,
    public readonly targetId: string,
    public readonly weight: number,
  ) {
    super(`Edge ${sourceId} -> ${targetId} has a non-finite weight: ${weight}`, 'INVALID_EDGE_WEIGHT', 'load');
    this.name = 'InvalidEdgeWeightError';
  }
}

export class GraphFrozenError extends DecisionError {
  constructor(public readonly operation: string) {
    super(`Knowledge graph is frozen; ${operation} is not allowed`, 'GRAPH_FROZEN', 'evaluate');
    this.name = 'GraphFrozenError';
  }
}

// ===== Rules =====

export class RuleValidationError extends DecisionError {
  constructor(public readonly ruleId: string, public readonly reason: string) {
    super(`Invalid rule ${ruleId}: ${reason}`, 'RULE_VALIDATION', 'load');
    this.name = 'RuleValidationError';
  }
}

// ===== Features =====

export class InvalidSurveyScoreError extends DecisionError {
  constructor(public readonly subjectId: string, public readonly score: number) {
    super(`Survey score for ${subjectId} must be a finite number, got ${score}`, 'INVALID_SURVEY_SCORE', 'load');
    this.name = 'InvalidSurveyScoreError';
  }
}

export class MissingFeatureError extends DecisionError {
  constructor(public readonly subjectId: string, public readonly feature: string) {
    super(`Subject ${subjectId} has no feature: ${feature}`, 'MISSING_FEATURE', 'evaluate');
    this.name = 'MissingFeatureError';
  }
}
