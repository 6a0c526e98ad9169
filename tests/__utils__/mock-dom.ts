/**
 * Minimal DOM stand-in for the timeline adapters: enough of Element and Document
 * for element construction, fragments, `after`/`remove`/`replaceChild`, click
 * listeners and `.class[attr]` queries.
 */

type Listener = (event: { type: string }) => void;

export class MockElement {
  readonly tagName: string;
  className = '';
  textContent: string | null = '';
  hidden = false;
  value = '';
  readonly style: { display: string } = { display: '' };
  readonly dataset: Record<string, string> = {};
  readonly children: MockElement[] = [];
  parent: MockElement | null = null;
  private readonly attributes = new Map<string, string>();
  private readonly listeners = new Map<string, Listener[]>();

  constructor(tagName: string) {
    this.tagName = tagName.toUpperCase();
  }

  get id(): string {
    return this.attributes.get('id') ?? '';
  }

  get parentNode(): MockElement | null {
    return this.parent;
  }

  get classList(): { add: (...names: string[]) => void } {
    return {
      add: (...names: string[]) => {
        this.className = [...this.className.split(' ').filter(Boolean), ...names].join(' ');
      }
    };
  }

  getBoundingClientRect(): { width: number; height: number } {
    return { width: 0, height: 0 };
  }

  setAttribute(name: string, value: string): void {
    this.attributes.set(name, value);
  }

  getAttribute(name: string): string | null {
    return this.attributes.get(name) ?? null;
  }

  hasAttribute(name: string): boolean {
    return this.attributes.has(name);
  }

  appendChild(child: MockElement): MockElement {
    const nodes = child.tagName === '#FRAGMENT' ? child.children.splice(0) : [child];
    nodes.forEach(node => {
      node.parent = this;
      this.children.push(node);
    });
    return child;
  }

  replaceChildren(...nodes: MockElement[]): void {
    this.children.splice(0).forEach(node => {
      node.parent = null;
    });
    nodes.forEach(node => this.appendChild(node));
  }

  replaceChild(node: MockElement, old: MockElement): MockElement {
    const index = this.children.indexOf(old);
    if (index >= 0) {
      this.children.splice(index, 1, node);
      node.parent = this;
      old.parent = null;
    }
    return old;
  }

  after(node: MockElement): void {
    if (!this.parent) {
      return;
    }
    const siblings = this.parent.children;
    siblings.splice(siblings.indexOf(this) + 1, 0, node);
    node.parent = this.parent;
  }

  remove(): void {
    if (this.parent) {
      const siblings = this.parent.children;
      siblings.splice(siblings.indexOf(this), 1);
      this.parent = null;
    }
  }

  addEventListener(type: string, listener: Listener): void {
    this.listeners.set(type, [...(this.listeners.get(type) ?? []), listener]);
  }

  click(): void {
    (this.listeners.get('click') ?? []).forEach(listener => listener({ type: 'click' }));
  }

  /** Supports `tag`, `.class` and `.class[attr]` selectors */
  querySelectorAll(selector: string): MockElement[] {
    const classMatch = /^\.([\w-]+)(?:\[([\w-]+)\])?$/.exec(selector);
    const matches = (element: MockElement): boolean => {
      if (classMatch) {
        const [, className, attribute] = classMatch;
        return (
          element.className.split(' ').includes(className) && (!attribute || element.hasAttribute(attribute))
        );
      }
      return element.tagName === selector.toUpperCase();
    };
    return this.descendants().filter(matches);
  }

  querySelector(selector: string): MockElement | null {
    return this.querySelectorAll(selector)[0] ?? null;
  }

  descendants(): MockElement[] {
    return this.children.flatMap(child => [child, ...child.descendants()]);
  }

  /** Own text followed by descendant text, joined by spaces */
  allText(): string {
    return [this.textContent ?? '', ...this.children.map(child => child.allText())].filter(Boolean).join(' ');
  }
}

/**
 * Install a fresh mock `document` on globalThis.
 */
export function installMockDocument(): void {
  Object.assign(globalThis, {
    document: {
      createElement: (tagName: string) => new MockElement(tagName),
      createElementNS: (_namespace: string, tagName: string) => new MockElement(tagName),
      createDocumentFragment: () => new MockElement('#fragment')
    }
  });
}

export function asHtmlElement(mock: MockElement): HTMLElement {
  return mock as unknown as HTMLElement;
}

export function asParentNode(mock: MockElement): ParentNode {
  return mock as unknown as ParentNode;
}

/**
 * Narrow an element built by the code under test back to the mock type.
 */
export function asMock(node: unknown): MockElement {
  if (node instanceof MockElement) {
    return node;
  }
  throw new Error('Expected a mock element');
}
