import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { writeDocument } from '../src/overlay/document_writer';

describe('writeDocument', () => {
    test('nests elements and escapes attribute values', () => {
        const text = writeDocument(doc => {
            doc.element('root', root => {
                root.attribute('a', 'x & "y"');
                root.element('child');
                root.element('leaf', leaf => leaf.attribute('k', '<v>'));
            });
        });

        assert.equal(
            text,
            [
                '<?xml version="1.0" encoding="utf-8" standalone="no"?>',
                '<root a="x &amp; &quot;y&quot;">',
                '    <child />',
                '    <leaf k="&lt;v&gt;" />',
                '</root>',
                '',
            ].join('\n')
        );
    });

    test('encodes whitespace that attribute normalisation would flatten', () => {
        const text = writeDocument(doc => {
            doc.element('meta-data', m => m.attribute('android:value', 'a\tb\r\nc'));
        });

        assert.equal(text.split('\n')[1], '<meta-data android:value="a&#9;b&#13;&#10;c" />');
    });

    test('keeps attribute order as declared', () => {
        const text = writeDocument(doc => {
            doc.element('e', e => {
                e.attribute('z', '1');
                e.attribute('a', '2');
            });
        }, { indent: '  ' });

        assert.equal(text.split('\n')[1], '<e z="1" a="2" />');
    });

    test('rejects a document without exactly one root', () => {
        assert.throws(() => writeDocument(() => undefined), /exactly one root element, got 0/);
        assert.throws(
            () => writeDocument(doc => {
                doc.element('a');
                doc.element('b');
            }),
            /exactly one root element, got 2/
        );
    });

    test('rejects invalid names and top-level attributes', () => {
        assert.throws(() => writeDocument(doc => doc.element('bad name')), /Invalid markup name/);
        assert.throws(() => writeDocument(doc => doc.attribute('a', 'b')), /inside an element/);
    });
});
