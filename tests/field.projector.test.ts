import { describe, it, expect } from 'vitest';
import { project } from '../src/projection/field.projector.js';

const objects = [
    { id: 'j1', status: 'failure', name: 'ocp-4.16', tags: ['daily'] },
    { id: 'j2', name: 'ocp-4.17' },
];

describe('project', () => {
    it('keeps only requested keys that exist', () => {
        expect(project(objects, ['id', 'status'])).toEqual([
            { id: 'j1', status: 'failure' },
            { id: 'j2' },
        ]);
    });

    it('turns every object into {} for an empty field list', () => {
        expect(project(objects, [])).toEqual([{}, {}]);
    });

    it('is idempotent', () => {
        const once = project(objects, ['name', 'tags']);
        expect(project(once, ['name', 'tags'])).toEqual(once);
    });

    it('does not synthesize missing keys', () => {
        expect(project(objects, ['missing'])).toEqual([{}, {}]);
    });

    it('leaves the input untouched', () => {
        project(objects, ['id']);
        expect(objects[0]).toEqual({ id: 'j1', status: 'failure', name: 'ocp-4.16', tags: ['daily'] });
    });
});
