// src/overlay/document_writer.ts

/**
 * Hierarchical markup writer. Elements are opened with a callback that
 * receives the element's own scope, so nesting in code mirrors nesting in
 * the document:
 *
 *   writeDocument(doc => {
 *       doc.element('manifest', m => {
 *           m.attribute('package', 'com.example.overlay');
 *           m.element('overlay', o => o.attribute('android:targetPackage', 'android'));
 *       });
 *   });
 */
export interface ElementScope {
    attribute(name: string, value: string): void;
    element(name: string, body?: (scope: ElementScope) => void): void;
}

interface ElementNode {
    name: string;
    attributes: [string, string][];
    children: ElementNode[];
}

const NAME_PATTERN = /^[A-Za-z_][\w.:-]*$/;

function assertName(name: string): void {
    if (!NAME_PATTERN.test(name)) {
        throw new Error(`Invalid markup name: ${JSON.stringify(name)}`);
    }
}

function escapeAttr(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/"/g, '&quot;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/\n/g, '&#10;')
        .replace(/\r/g, '&#13;')
        .replace(/\t/g, '&#9;');
}

function scopeFor(node: ElementNode): ElementScope {
    return {
        attribute(name, value) {
            assertName(name);
            node.attributes.push([name, value]);
        },
        element(name, body) {
            assertName(name);
            const child: ElementNode = { name, attributes: [], children: [] };
            node.children.push(child);
            body?.(scopeFor(child));
        },
    };
}

function serialize(node: ElementNode, depth: number, indent: string, out: string[]): void {
    const pad = indent.repeat(depth);
    const attrs = node.attributes.map(([k, v]) => ` ${k}="${escapeAttr(v)}"`).join('');
    if (node.children.length === 0) {
        out.push(`${pad}<${node.name}${attrs} />`);
        return;
    }
    out.push(`${pad}<${node.name}${attrs}>`);
    for (const child of node.children) serialize(child, depth + 1, indent, out);
    out.push(`${pad}</${node.name}>`);
}

export interface WriteDocumentOptions {
    indent?: string;
}

/** Serializes the single root element declared in `body`, with an XML declaration. */
export function writeDocument(body: (doc: ElementScope) => void, options: WriteDocumentOptions = {}): string {
    const holder: ElementNode = { name: '#document', attributes: [], children: [] };
    body({
        attribute() {
            throw new Error('Attributes must be declared inside an element');
        },
        element: scopeFor(holder).element,
    });

    if (holder.children.length !== 1) {
        throw new Error(`Document must have exactly one root element, got ${holder.children.length}`);
    }

    const out: string[] = ['<?xml version="1.0" encoding="utf-8" standalone="no"?>'];
    serialize(holder.children[0], 0, options.indent ?? '    ', out);
    return out.join('\n') + '\n';
}
