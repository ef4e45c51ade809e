import { describe, it, expect } from 'vitest';
import { MockBackend, MockResource, STACK_TYPE } from '../resources/mock.js';
import { ExtensionHandler } from '../extensions/base.js';
import { ResourceError, StateError } from '../errors/index.js';
import { createMemoryLogger } from '../log/logger.js';
import type { ResourceTreeNode } from '../types/resources.js';

class NoopExtension extends ExtensionHandler {
  validateConfig(): void {}
  execute(): void {}
}

function newBackend() {
  const { logger } = createMemoryLogger('test.backend');
  return new MockBackend({ stackName: 'dev', logger, config: { 'app:region': 'eu-north' } });
}

function names(node: ResourceTreeNode): string[] {
  return [node.name, ...node.children.flatMap(names)];
}

describe('MockResource', () => {
  it('registers itself with its parent', () => {
    const stack = new MockResource(STACK_TYPE, 'root');
    const child = new MockResource('x:y', 'child', {}, { parent: stack });
    expect(stack.getChildren()).toEqual([child]);
    expect(child.urn).toBe('urn:mock:x:y::child');
  });

  it('exports only from a stack', () => {
    const stack = new MockResource(STACK_TYPE, 'root');
    const child = new MockResource('x:y', 'child', {}, { parent: stack });
    stack.export('k', 1);
    expect(stack.getOutput('k')).toBe(1);
    expect(() => child.export('k', 1)).toThrow(ResourceError);
    expect(() => child.export('k', 1)).toThrow('Failed to export output: export target is not a stack');
  });
});

describe('MockBackend', () => {
  it('roots the run in a protected stack node', () => {
    const backend = newBackend();
    expect(backend.getResourceTree()).toEqual({
      type: STACK_TYPE,
      name: 'dev',
      properties: { mock: true, name: 'dev' },
      urn: 'urn:mock:pulumi:stack:Stack::dev',
      children: []
    });
    expect(backend.root.protect).toBe(true);
  });

  it('rejects duplicate names', () => {
    const backend = newBackend();
    backend.createResource('a:b', 'one');
    expect(() => backend.createResource('a:c', 'one')).toThrow('Duplicate resource name: one');
  });

  it('requires parents from the same tree', () => {
    const backend = newBackend();
    const stranger = new MockResource('a:b', 'elsewhere');
    expect(() => backend.createResource('a:b', 'child', {}, { parent: stranger })).toThrow(ResourceError);
  });

  it('reads seeded configuration', () => {
    const backend = newBackend();
    expect(backend.getConfigValue('app', 'region')).toBe('eu-north');
    expect(backend.getConfigValue('app', 'zone')).toBeUndefined();
  });
});

describe('ExtensionHandler', () => {
  it('creates a protected extension node under the run root', () => {
    const backend = newBackend();
    const ext = new NoopExtension();
    ext.initialize('build', 'dev', backend);

    expect(ext.stackName).toBe('dev.build');
    const node = backend.getResource('dev.build');
    expect(node?.resourceType).toBe('pipeline:extension:build');
    expect(node?.protect).toBe(true);
    expect(node?.parent).toBe(backend.root);
    expect(node?.properties).toEqual({ name: 'build', parent_stack: 'dev', type: 'pipeline:extension:build' });
  });

  it('namespaces resources and nests them under the extension', () => {
    const backend = newBackend();
    const ext = new NoopExtension();
    ext.initialize('build', 'dev', backend);
    const outer = ext.createResource('build:step', 'compile', { target: 'es2022' });
    ext.createResource('build:artifact', 'bundle', {}, outer);

    const bundle = backend.getResource('dev.build.bundle');
    expect(bundle?.properties).toEqual({
      type: 'build:artifact',
      stack: 'dev.build',
      extension: 'build',
      parent_resource: 'dev.build.compile'
    });
    expect(bundle?.protect).toBe(false);
    expect(backend.getResource('dev.build.compile')?.properties).toEqual({
      type: 'build:step',
      stack: 'dev.build',
      extension: 'build',
      parent_resource: null,
      target: 'es2022'
    });
    expect(names(backend.getResourceTree())).toEqual(['dev', 'dev.build', 'dev.build.compile', 'dev.build.bundle']);

    // parent chain: bundle -> compile -> extension node -> stack
    const chain: string[] = [];
    for (let r = bundle; r; r = r.parent) chain.push(r.name);
    expect(chain).toEqual(['dev.build.bundle', 'dev.build.compile', 'dev.build', 'dev']);
  });

  it('collects outputs and exports them on the stack', () => {
    const backend = newBackend();
    const ext = new NoopExtension();
    ext.initialize('build', 'dev', backend);
    ext.exportOutput('result', 'ok');
    ext.exportOutput('result', 'again');

    expect(ext.getOutputData()).toEqual({ result: ['ok', 'again'] });
    expect(backend.getOutput('build_result')).toBe('again');
  });

  it('exports the final state once on cleanup', () => {
    const backend = newBackend();
    const ext = new NoopExtension();
    ext.initialize('build', 'dev', backend);
    ext.state.step = 'compiled';
    ext.exportOutput('result', 1);

    ext.cleanup();
    ext.cleanup();
    expect(backend.getOutput('build_final_state')).toEqual({ state: { step: 'compiled' }, outputs: { result: [1] } });
    expect(ext.state).toEqual({});
  });

  it('refuses to create resources before initialize', () => {
    expect(() => new NoopExtension().createResource('a:b', 'x')).toThrow(StateError);
  });
});
