export interface XmlElement {
    name: string;
    attributes: [string, string][];
    children: XmlNode[];
}

export type XmlNode = XmlElement | string;

export function element(
    name: string,
    attributes: Record<string, string> = {},
    ...children: XmlNode[]
): XmlElement {
    return { name, attributes: Object.entries(attributes), children };
}

/** Element holding a single text value, e.g. `<NAME>Acme</NAME>`. */
export function textElement(name: string, value: string | number): XmlElement {
    return element(name, {}, String(value));
}

export function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

const INDENT = '    ';

function renderAttributes(node: XmlElement): string {
    return node.attributes.map(([key, value]) => ` ${key}="${escapeXml(value)}"`).join('');
}

function renderNode(node: XmlNode, depth: number): string {
    const pad = INDENT.repeat(depth);
    if (typeof node === 'string') {
        return pad + escapeXml(node);
    }

    const open = `<${node.name}${renderAttributes(node)}`;
    if (node.children.length === 0) {
        return `${pad}${open}/>`;
    }

    const [first] = node.children;
    if (node.children.length === 1 && typeof first === 'string') {
        return `${pad}${open}>${escapeXml(first)}</${node.name}>`;
    }

    const inner = node.children.map(child => renderNode(child, depth + 1)).join('\n');
    return `${pad}${open}>\n${inner}\n${pad}</${node.name}>`;
}

/** Serializes a document tree with an XML declaration and 4-space indentation. */
export function serializeXml(root: XmlElement): string {
    return `<?xml version="1.0" encoding="UTF-8"?>\n${renderNode(root, 0)}`;
}
