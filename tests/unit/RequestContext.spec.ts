import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    createPresentationContext,
    createProcessingContext
} from '../../libs/context/requestContext.js';
import { EDITOR, READER } from '../support/article.js';
import { StubViewContext } from '../support/stubViewContext.js';

describe('RequestContext', () => {
    it('should bundle actor, view context and options for presentation', () => {
        const view = new StubViewContext();
        const ctx = createPresentationContext(READER, view, { enforcePermissions: true });

        assert.strictEqual(ctx.actor, READER);
        assert.strictEqual(ctx.viewContext, view);
        assert.deepStrictEqual(ctx.options, { enforcePermissions: true });
    });

    it('should freeze presentation contexts', () => {
        const ctx = createPresentationContext(READER, new StubViewContext(), { enforcePermissions: true });

        assert.ok(Object.isFrozen(ctx));
        assert.ok(Object.isFrozen(ctx.options));
        assert.throws(() => {
            Object.assign(ctx, { actor: EDITOR });
        }, TypeError);
    });

    it('should copy options so later caller changes do not leak in', () => {
        const options = { enforcePermissions: true, layout: 'full' };
        const ctx = createPresentationContext(READER, new StubViewContext(), options);
        options.layout = 'compact';

        assert.strictEqual(ctx.options.layout, 'full');
    });

    it('should create a distinct context per call', () => {
        const view = new StubViewContext();
        const a = createPresentationContext(READER, view, { enforcePermissions: true });
        const b = createPresentationContext(READER, view, { enforcePermissions: true });

        assert.notStrictEqual(a, b);
        assert.deepStrictEqual(a, b);
    });

    it('should freeze processing contexts and their attributes', () => {
        const attributes = { title: 'Hello' };
        const ctx = createProcessingContext(attributes, EDITOR, { as: 'admin' });

        assert.ok(Object.isFrozen(ctx));
        assert.ok(Object.isFrozen(ctx.attributes));
        assert.notStrictEqual(ctx.attributes, attributes);
        assert.deepStrictEqual(ctx.attributes, { title: 'Hello' });
        assert.strictEqual(ctx.options.as, 'admin');
        assert.strictEqual(ctx.actor, EDITOR);
    });
});
