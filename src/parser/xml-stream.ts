import { SaxesParser, type SaxesAttribute, type SaxesTag } from 'saxes';

/** Line and column origin for diagnostics and traceability. */
export interface XmlLocation {
  line: number;
  column: number;
}

/**
 * Element state handed to stream handlers.
 * `text` holds the element's own character data and is complete only when the element closes.
 */
export interface XmlElement {
  name: string;
  attributes: Readonly<Record<string, string>>;
  location: XmlLocation;
  /** XPath-like path with sibling indexes, e.g. `/score-partwise[1]/part[2]`. */
  path: string;
  parent?: XmlElement;
  text: string;
}

/** Callbacks fired in document order while the stream is tokenized. */
export interface XmlStreamHandler {
  onOpen?(element: XmlElement): void;
  onClose?(element: XmlElement): void;
}

/** Tokenizer failure that keeps source coordinates when available. */
export class XmlParseError extends Error {
  readonly source?: XmlLocation;

  constructor(message: string, source?: XmlLocation) {
    super(message);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

/** Builder state kept on the open-element stack. */
interface OpenElement extends XmlElement {
  childNameCount: Map<string, number>;
}

/**
 * Tokenize `xmlText` and report start-element, character and end-element events
 * through `handler` without building a tree.
 * Errors thrown by the handler propagate unchanged.
 */
export function streamXml(xmlText: string, handler: XmlStreamHandler, sourceName?: string): void {
  const parser = new SaxesParser({
    xmlns: true,
    position: true,
    fileName: sourceName
  });

  const stack: OpenElement[] = [];
  const openTagLocations: XmlLocation[] = [];
  let sawRoot = false;
  let parseError: XmlParseError | undefined;

  parser.on('error', (error) => {
    if (!parseError) {
      parseError = new XmlParseError(error.message, {
        line: parser.line,
        column: parser.column + 1
      });
    }
  });

  parser.on('opentagstart', () => {
    openTagLocations.push({
      line: parser.line,
      column: parser.column + 1
    });
  });

  parser.on('opentag', (tag) => {
    if (parseError) {
      return;
    }

    const location = openTagLocations.pop() ?? { line: parser.line, column: parser.column + 1 };
    const parent = stack.at(-1);
    const name = getNodeName(tag);
    const element: OpenElement = {
      name,
      attributes: toAttributeMap(tag),
      location,
      path: buildPath(parent, name),
      parent,
      text: '',
      childNameCount: new Map<string, number>()
    };

    sawRoot = true;
    stack.push(element);
    handler.onOpen?.(element);
  });

  parser.on('text', (text) => {
    const current = stack.at(-1);
    if (current) {
      current.text += text;
    }
  });

  parser.on('cdata', (text) => {
    const current = stack.at(-1);
    if (current) {
      current.text += text;
    }
  });

  parser.on('closetag', () => {
    const element = stack.pop();
    if (element && !parseError) {
      handler.onClose?.(element);
    }
  });

  parser.write(xmlText).close();

  if (parseError) {
    throw parseError;
  }

  if (!sawRoot) {
    throw new XmlParseError('No XML root element found');
  }
}

/** Trimmed element text, or `undefined` when empty. */
export function trimmedText(element: XmlElement): string | undefined {
  const text = element.text.trim();
  return text.length > 0 ? text : undefined;
}

/** Parse base-10 integer values with `undefined` on failure. */
export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/** Parse float values with `undefined` on failure. */
export function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/** Prefer namespace-local names so downstream logic can stay prefix-agnostic. */
function getNodeName(tag: SaxesTag): string {
  if (tag.local && tag.local.length > 0) {
    return tag.local;
  }

  const name = tag.name;
  const index = name.indexOf(':');
  return index === -1 ? name : name.slice(index + 1);
}

/** Normalize SAX attribute payload into string values keyed by both qualified and local names. */
function toAttributeMap(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [key, value] of Object.entries(tag.attributes)) {
    if (typeof value === 'string') {
      out[key] = value;
      continue;
    }

    setAttributeAlias(out, value, key);
  }

  return out;
}

function setAttributeAlias(out: Record<string, string>, attribute: SaxesAttribute, key: string): void {
  out[key] = attribute.value;

  if ('local' in attribute) {
    out[attribute.local] = attribute.value;
    out[attribute.name] = attribute.value;
  }
}

/** Build deterministic element paths with sibling indexes. */
function buildPath(parent: OpenElement | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  const next = (parent.childNameCount.get(name) ?? 0) + 1;
  parent.childNameCount.set(name, next);
  return `${parent.path}/${name}[${next}]`;
}
