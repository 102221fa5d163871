import { AnyNode, Element, isComment, isDirective, isDocument, isTag, isText } from 'domhandler';

const VOID_ELEMENTS = new Set([
    'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input',
    'link', 'meta', 'param', 'source', 'track', 'wbr',
]);

// Parsed as a single text node holding markup; emitted unescaped
const RAW_TEXT_ELEMENTS = new Set(['script', 'style', 'noscript', 'iframe', 'noembed', 'noframes', 'xmp']);

// Content is emitted as parsed, on the same line as its tags
const VERBATIM_ELEMENTS = new Set(['pre', 'textarea', ...RAW_TEXT_ELEMENTS]);

const INDENT = ' ';

function escapeText(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

function escapeAttribute(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/"/g, '&quot;');
}

function openTag(element: Element): string {
    const attributes = Object.entries(element.attribs)
        .map(([name, value]) => `${name}="${escapeAttribute(value)}"`);
    const head = [element.name, ...attributes].join(' ');
    return VOID_ELEMENTS.has(element.name) ? `<${head}/>` : `<${head}>`;
}

function rawContent(element: Element): string {
    return element.children
        .map((child) => (isText(child) ? child.data : ''))
        .join('');
}

function verbatimContent(element: Element, serialize: (node: AnyNode) => string): string {
    if (RAW_TEXT_ELEMENTS.has(element.name)) {
        return rawContent(element);
    }
    return element.children.map(serialize).join('');
}

/**
 * Serializes a parsed document one node per line, indenting each nesting
 * level by one space and trimming text nodes. Whitespace-only text is dropped.
 * `serialize` renders a subtree as-is and is used for elements whose content
 * must not be re-flowed.
 */
export function prettifyHtml(nodes: AnyNode[], serialize: (node: AnyNode) => string): string {
    const lines: string[] = [];

    const visit = (node: AnyNode, depth: number): void => {
        const pad = INDENT.repeat(depth);

        if (isText(node)) {
            const text = node.data.trim();
            if (text) {
                lines.push(pad + escapeText(text));
            }
            return;
        }

        if (isComment(node)) {
            lines.push(`${pad}<!--${node.data}-->`);
            return;
        }

        if (isDirective(node)) {
            lines.push(`${pad}<${node.data}>`);
            return;
        }

        // <template> content is parsed into a nested document fragment
        if (isDocument(node)) {
            for (const child of node.children) {
                visit(child, depth);
            }
            return;
        }

        if (!isTag(node)) {
            return;
        }

        if (VOID_ELEMENTS.has(node.name)) {
            lines.push(pad + openTag(node));
            return;
        }

        if (VERBATIM_ELEMENTS.has(node.name)) {
            const content = verbatimContent(node, serialize);
            lines.push(`${pad}${openTag(node)}${content}</${node.name}>`);
            return;
        }

        lines.push(pad + openTag(node));
        for (const child of node.children) {
            visit(child, depth + 1);
        }
        lines.push(`${pad}</${node.name}>`);
    };

    for (const node of nodes) {
        visit(node, 0);
    }

    return lines.join('\n');
}
