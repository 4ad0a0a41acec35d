import { describe, it, expect } from 'vitest';
import {
  approximateStrategy,
  classifierStrategy,
  failedCandidate,
  invokeStrategy,
  ruleStrategy,
  runStrategy,
  templateStrategy,
} from './strategy.js';
import { normalize } from '../query/query-normalizer.js';
import {
  EMPTY_SEARCH,
  PLACEHOLDER,
  prediction,
  similarityResult,
  stubClassifier,
  stubMatcher,
  stubRules,
  stubTemplates,
  templateResolution,
} from './test-helpers.js';

const QUERY = 'list all files';
const PROCESSED = normalize(QUERY);

describe('runStrategy', () => {
  it('passes a candidate through', () => {
    const candidate = failedCandidate('rule', 'No rule matched');
    expect(runStrategy('rule', () => candidate)).toBe(candidate);
  });

  it('converts a thrown error into a failed candidate', () => {
    const candidate = runStrategy('ml', () => {
      throw new Error('boom');
    });
    expect(candidate).toEqual({
      method: 'ml',
      command: null,
      confidence: 0,
      succeeded: false,
      error: 'ml strategy failed: boom',
      metadata: {},
    });
  });

  it('converts a thrown non-error value', () => {
    const candidate = runStrategy('fuzzy', () => {
      throw 'bad';
    });
    expect(candidate.error).toBe('fuzzy strategy failed: bad');
  });
});

describe('invokeStrategy', () => {
  it('reports a missing strategy as unavailable', () => {
    const outcome = invokeStrategy('template', null, QUERY, PROCESSED, 'linux');
    expect(outcome.status).toBe('unavailable');
    if (outcome.status === 'unavailable') {
      expect(outcome.error.message).toBe('template strategy unavailable: not loaded');
    }
  });

  it('runs an available strategy', () => {
    const strategy = ruleStrategy(stubRules('ls -la'));
    const outcome = invokeStrategy('rule', strategy, QUERY, PROCESSED, 'linux');
    expect(outcome).toMatchObject({ status: 'ran', candidate: { command: 'ls -la' } });
  });
});

describe('classifierStrategy', () => {
  it('predicts on the normalized query and maps the label', () => {
    const classifier = stubClassifier(prediction('list_files', 0.42), 'ls -la');
    const candidate = classifierStrategy(classifier).resolve('List ALL files!', normalize('List ALL files!'), 'linux');
    expect(classifier.predict).toHaveBeenCalledWith('list all files');
    expect(classifier.labelToCommand).toHaveBeenCalledWith('list_files', 'linux');
    expect(candidate).toMatchObject({ method: 'ml', command: 'ls -la', confidence: 0.42, succeeded: true });
  });

  it('withholds the command below the confidence threshold', () => {
    const classifier = stubClassifier(prediction('list_files', 0.42), 'ls -la');
    const candidate = classifierStrategy(classifier, 0.6).resolve(QUERY, PROCESSED, 'linux');
    expect(candidate).toMatchObject({ method: 'ml', command: null, confidence: 0.42, succeeded: false });
    expect(candidate.error).toBe('Prediction "list_files" below confidence threshold');
    expect(classifier.labelToCommand).not.toHaveBeenCalled();
  });

  it('fails with zero confidence when the label has no command', () => {
    const candidate = classifierStrategy(stubClassifier(prediction('x', 0.9), null)).resolve(QUERY, PROCESSED, 'windows');
    expect(candidate).toMatchObject({ command: null, confidence: 0, succeeded: false });
    expect(candidate.error).toBe('No windows command for intent "x"');
  });
});

describe('templateStrategy', () => {
  it('reports the generated command', () => {
    const candidate = templateStrategy(stubTemplates(templateResolution('mkdir proj'))).resolve(QUERY, PROCESSED, 'linux');
    expect(candidate).toMatchObject({ method: 'template', command: 'mkdir proj', confidence: 0.95 });
    expect(candidate.metadata.templateKey).toBe('create_folder');
  });

  it('fails when no template applies', () => {
    const candidate = templateStrategy(stubTemplates(null)).resolve(QUERY, PROCESSED, 'linux');
    expect(candidate.error).toBe('No template matched');
  });
});

describe('approximateStrategy', () => {
  it('scales similarity confidence to 0-1', () => {
    const candidate = approximateStrategy(stubMatcher(similarityResult('ls -la', 92.31))).resolve(QUERY, PROCESSED, 'linux');
    expect(candidate).toMatchObject({ method: 'fuzzy', command: 'ls -la', succeeded: true });
    expect(candidate.confidence).toBeCloseTo(0.9231, 4);
  });

  it('reports diagnoses as problem_diagnosis', () => {
    const matcher = stubMatcher({
      matches: [],
      diagnoses: [],
      best: {
        source: 'problem_diagnosis',
        command: 'ipconfig /renew',
        explanation: 'Renew the address',
        category: 'network',
        problem: 'internet not working',
      },
      confidence: 90,
    });
    const candidate = approximateStrategy(matcher).resolve(QUERY, PROCESSED, 'windows');
    expect(candidate).toMatchObject({
      method: 'problem_diagnosis',
      command: 'ipconfig /renew',
      confidence: 0.9,
      explanation: 'Renew the address',
    });
  });

  it('fails without a best match', () => {
    const candidate = approximateStrategy(stubMatcher(EMPTY_SEARCH)).resolve(QUERY, PROCESSED, 'linux');
    expect(candidate).toMatchObject({ method: 'fuzzy', command: null, succeeded: false });
  });
});

describe('ruleStrategy', () => {
  it('reports rule hits with confidence 1', () => {
    const candidate = ruleStrategy(stubRules('ls -la')).resolve(QUERY, PROCESSED, 'linux');
    expect(candidate).toMatchObject({ method: 'rule', command: 'ls -la', confidence: 1, succeeded: true });
  });

  it('turns the placeholder into a failed candidate', () => {
    const candidate = ruleStrategy(stubRules(PLACEHOLDER)).resolve(QUERY, PROCESSED, 'linux');
    expect(candidate).toMatchObject({ command: null, confidence: 0, succeeded: false });
    expect(candidate.metadata.placeholder).toBe(PLACEHOLDER);
  });
});
