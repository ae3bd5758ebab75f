import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode, type Element } from "domhandler";

/**
 * Describes the elements a traversal should stop on.
 * Every field that is set must match.
 */
export interface ElementQuery {
    tag?: string;
    id?: string;
    /** Class tokens that must all be present */
    classes?: string[];
    /** Attributes that must equal the given values */
    attrs?: Record<string, string>;
    /** Attributes that must be present with any value */
    hasAttrs?: string[];
}

export function matchesQuery(element: Element, query: ElementQuery): boolean {
    if (query.tag && element.name !== query.tag) return false;
    if (query.id && element.attribs.id !== query.id) return false;

    if (query.classes) {
        const tokens = (element.attribs.class ?? "").split(/\s+/).filter(Boolean);
        if (!query.classes.every((cls) => tokens.includes(cls))) return false;
    }

    if (query.attrs) {
        for (const [name, value] of Object.entries(query.attrs)) {
            if (element.attribs[name] !== value) return false;
        }
    }

    if (query.hasAttrs) {
        if (!query.hasAttrs.every((name) => name in element.attribs)) return false;
    }

    return true;
}

/**
 * Pre-order successor of `node`: first child, else next sibling, else the
 * next sibling of the nearest ancestor that has one. Never leaves `boundary`.
 */
function nextInDocument(node: AnyNode, boundary: AnyNode | null): AnyNode | null {
    if (hasChildren(node) && node.children.length > 0) {
        return node.children[0];
    }

    let current: AnyNode | null = node;
    while (current && current !== boundary) {
        if (current.next) return current.next;
        current = current.parent;
    }
    return null;
}

function* descendants(root: AnyNode): Generator<Element> {
    let current = nextInDocument(root, root);
    while (current) {
        if (isTag(current)) yield current;
        current = nextInDocument(current, root);
    }
}

export class HtmlNode {
    constructor(
        private readonly $: CheerioAPI,
        readonly element: Element
    ) {}

    get tagName(): string {
        return this.element.name;
    }

    attr(name: string): string | null {
        return this.element.attribs[name] ?? null;
    }

    /** Text content with surrounding whitespace trimmed */
    text(): string {
        return this.$(this.element).text().trim();
    }

    find(query: ElementQuery): HtmlNode | null {
        for (const element of descendants(this.element)) {
            if (matchesQuery(element, query)) return this.wrap(element);
        }
        return null;
    }

    findAll(query: ElementQuery): HtmlNode[] {
        const found: HtmlNode[] = [];
        for (const element of descendants(this.element)) {
            if (matchesQuery(element, query)) found.push(this.wrap(element));
        }
        return found;
    }

    /**
     * Next matching element in document order, starting with this node's own
     * descendants. With `within`, the search does not leave that subtree.
     */
    findNext(query: ElementQuery, within?: HtmlNode): HtmlNode | null {
        const boundary = within ? within.element : null;
        let current = nextInDocument(this.element, boundary);
        while (current) {
            if (isTag(current) && matchesQuery(current, query)) return this.wrap(current);
            current = nextInDocument(current, boundary);
        }
        return null;
    }

    nextSiblingMatching(query: ElementQuery): HtmlNode | null {
        let sibling = this.element.next;
        while (sibling) {
            if (isTag(sibling) && matchesQuery(sibling, query)) return this.wrap(sibling);
            sibling = sibling.next;
        }
        return null;
    }

    childElements(query: ElementQuery = {}): HtmlNode[] {
        return this.element.children
            .filter((child): child is Element => isTag(child) && matchesQuery(child, query))
            .map((child) => this.wrap(child));
    }

    closest(query: ElementQuery): HtmlNode | null {
        let current = this.element.parent;
        while (current) {
            if (isTag(current) && matchesQuery(current, query)) return this.wrap(current);
            current = current.parent;
        }
        return null;
    }

    /**
     * Trimmed text of the node right after this one, when that node is text.
     * Markup like `<strong>Serving Size</strong> 1 cup` keeps values there.
     */
    nextTextSibling(): string | null {
        const sibling = this.element.next;
        if (sibling && isText(sibling)) {
            return sibling.data.trim();
        }
        return null;
    }

    private wrap(element: Element): HtmlNode {
        return new HtmlNode(this.$, element);
    }
}

export class HtmlDocument {
    private constructor(
        private readonly $: CheerioAPI,
        private readonly root: AnyNode
    ) {}

    static parse(html: string): HtmlDocument {
        const $ = cheerio.load(html);
        const root = $.root().get(0);
        if (!root) {
            throw new Error("cheerio returned an empty document");
        }
        return new HtmlDocument($, root);
    }

    find(query: ElementQuery): HtmlNode | null {
        for (const element of descendants(this.root)) {
            if (matchesQuery(element, query)) return new HtmlNode(this.$, element);
        }
        return null;
    }

    findAll(query: ElementQuery): HtmlNode[] {
        const found: HtmlNode[] = [];
        for (const element of descendants(this.root)) {
            if (matchesQuery(element, query)) found.push(new HtmlNode(this.$, element));
        }
        return found;
    }
}

/** First run of digits in `text`, e.g. an item id inside a detail-page URL */
export function firstDigits(text: string): string | null {
    const match = text.match(/\d+/);
    return match ? match[0] : null;
}
