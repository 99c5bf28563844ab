import { describe, expect, it } from 'vitest';
import { ArtifactOverwriteError, UpstreamArtifactMissingError } from '../errors';
import { ArtifactStore } from './artifactStore';

interface TestArtifacts {
    paths: string[];
    count: number;
    [variant: `fit.${string}`]: string[];
}

describe('ArtifactStore', () => {
    it('returns what a stage published', () => {
        const store = new ArtifactStore<TestArtifacts>();
        store.publish('run-1', 'paths', ['a.csv']);
        store.publish('run-1', 'fit.minmax', ['x', 'y']);

        expect(store.get('run-1', 'paths')).toEqual(['a.csv']);
        expect(store.get('run-1', 'fit.minmax')).toEqual(['x', 'y']);
        expect(store.stageIds('run-1')).toEqual(['paths', 'fit.minmax']);
    });

    it('refuses a second write to the same stage within a run', () => {
        const store = new ArtifactStore<TestArtifacts>();
        store.publish('run-1', 'count', 1);

        expect(() => store.publish('run-1', 'count', 2)).toThrow(ArtifactOverwriteError);
        expect(store.get('run-1', 'count')).toBe(1);
    });

    it('raises UpstreamArtifactMissingError for unpublished stages', () => {
        const store = new ArtifactStore<TestArtifacts>();

        expect(() => store.get('run-1', 'count')).toThrow(new UpstreamArtifactMissingError('run-1', 'count'));
        expect(store.find('run-1', 'count')).toBeUndefined();
    });

    it('keeps runs apart and purges only the requested run', () => {
        const store = new ArtifactStore<TestArtifacts>();
        store.publish('run-1', 'count', 1);
        store.publish('run-2', 'count', 2);

        expect(store.purge('run-1')).toBe(1);
        expect(store.runIds()).toEqual(['run-2']);
        expect(store.find('run-1', 'count')).toBeUndefined();
        expect(store.get('run-2', 'count')).toBe(2);
        expect(store.purge('run-1')).toBe(0);
    });

    it('exposes the same operations through a run scope', () => {
        const store = new ArtifactStore<TestArtifacts>();
        const scope = store.scope('run-3');
        scope.publish('count', 3);

        expect(scope.get('count')).toBe(3);
        expect(store.get('run-3', 'count')).toBe(3);
        expect(scope.purge()).toBe(1);
        expect(scope.find('count')).toBeUndefined();
    });
});
