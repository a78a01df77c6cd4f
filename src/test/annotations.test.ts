import * as assert from 'assert';
import { AnnotationRenderer, escapeHtml, escapeMarkdown, hoverMarkdown } from '../services/AnnotationRenderer';
import { ErrorIndex } from '../services/ErrorIndex';
import { FakeAnnotationHost } from './fakes';

suite('ErrorIndex', () => {
    test('groups matches by file in output order', () => {
        const index = new ErrorIndex();
        index.rebuild([
            { file: 'a.py', line: 3, column: 5, message: 'first' },
            { file: 'b.py', line: 1, column: 0, message: 'no column' },
            { file: 'a.py', line: 7, column: 2, message: 'second' },
            { file: 'c.py', line: 0, column: 1, message: 'no line' }
        ]);

        assert.deepStrictEqual(index.files(), ['a.py', 'b.py']);
        assert.strictEqual(index.size, 3);
        assert.deepStrictEqual(index.toJSON(), {
            'a.py': [
                { line: 3, column: 5, message: 'first' },
                { line: 7, column: 2, message: 'second' }
            ],
            'b.py': [{ line: 1, column: 1, message: 'no column' }]
        });
    });

    test('rebuild replaces earlier contents', () => {
        const index = new ErrorIndex();
        index.rebuild([{ file: 'old.c', line: 1, column: 1, message: 'gone' }]);
        index.rebuild([{ file: 'new.c', line: 2, column: 1, message: 'kept' }]);

        assert.deepStrictEqual(index.files(), ['new.c']);
        assert.deepStrictEqual(index.get('old.c'), []);
    });
});

suite('AnnotationRenderer', () => {
    test('escapes markup in messages', () => {
        assert.strictEqual(escapeHtml('expected <T> & got "x"'), 'expected &lt;T&gt; &amp; got "x"');
    });

    test('hover text keeps links in messages inert and adds only the dismiss link', () => {
        const html = escapeHtml('see [fix](command:workbench.action.quit) <T>');
        assert.strictEqual(
            hoverMarkdown({ html }, 'buildPanel.hideAnnotations'),
            'see \\[fix\\]\\(command:workbench\\.action\\.quit\\) &lt;T&gt; [×](command:buildPanel.hideAnnotations)'
        );
    });

    test('escapes every Markdown construct character', () => {
        assert.strictEqual(escapeMarkdown('*a* _b_ `c` #1 !x|y~z\\'), '\\*a\\* \\_b\\_ \\`c\\` \\#1 \\!x\\|y\\~z\\\\');
    });

    test('anchors one marker per error at its line and column', () => {
        const host = new FakeAnnotationHost();
        const view = host.open('main.c');
        const index = new ErrorIndex();
        index.rebuild([
            { file: 'main.c', line: 3, column: 5, message: 'use of <undeclared>' },
            { file: 'main.c', line: 10, column: 1, message: 'unused variable' },
            { file: 'closed.c', line: 1, column: 1, message: 'not open' }
        ]);

        new AnnotationRenderer(host, index).render();

        assert.deepStrictEqual(view.created, ['build-panel']);
        assert.strictEqual(view.updates.length, 1);
        const markers = view.updates[0].map(({ start, end, message, html }) => ({ start, end, message, html }));
        assert.deepStrictEqual(markers, [
            { start: 204, end: 299, message: 'use of <undeclared>', html: 'use of &lt;undeclared&gt;' },
            { start: 900, end: 999, message: 'unused variable', html: 'unused variable' }
        ]);
    });

    test('reuses the marker set of a view across renders', () => {
        const host = new FakeAnnotationHost();
        const view = host.open('main.c');
        const index = new ErrorIndex();
        const renderer = new AnnotationRenderer(host, index);

        index.rebuild([{ file: 'main.c', line: 1, column: 1, message: 'one' }]);
        renderer.render();
        index.rebuild([{ file: 'main.c', line: 2, column: 1, message: 'two' }]);
        renderer.render();

        assert.deepStrictEqual(view.created, ['build-panel']);
        assert.deepStrictEqual(view.updates.map(markers => markers.map(m => m.message)), [['one'], ['two']]);
    });

    test('dismissing a marker hides every marker and stops rendering', () => {
        const host = new FakeAnnotationHost();
        const first = host.open('a.c');
        const second = host.open('b.c');
        const index = new ErrorIndex();
        index.rebuild([
            { file: 'a.c', line: 1, column: 1, message: 'x' },
            { file: 'b.c', line: 2, column: 1, message: 'y' }
        ]);
        const logged: string[] = [];
        const renderer = new AnnotationRenderer(host, index, (msg) => logged.push(msg));
        renderer.render();

        first.updates[0][0].onDismiss();

        assert.deepStrictEqual(first.erased, ['build-panel']);
        assert.deepStrictEqual(second.erased, ['build-panel']);
        assert.strictEqual(index.size, 0);
        assert.strictEqual(renderer.enabled, false);
        assert.deepStrictEqual(logged, ['[AnnotationRenderer] Cleared markers in 2 view(s)']);

        index.rebuild([{ file: 'a.c', line: 1, column: 1, message: 'again' }]);
        renderer.render();
        assert.strictEqual(first.updates.length, 1);
    });
});
