/**
 * DOM construction helpers
 * @module DOMUtils
 */

const SVG_NS = 'http://www.w3.org/2000/svg';

/**
 * Batch DOM operations using DocumentFragment
 * @param container
 * @param elements
 */
export function batchAppend(container: Element | null, elements: readonly Element[]): void {
  if (!container || elements.length === 0) {
    return;
  }

  const fragment = document.createDocumentFragment();
  elements.forEach(el => fragment.appendChild(el));
  container.appendChild(fragment);
}

interface CreateElementOptions {
  attributes?: Record<string, string>;
  textContent?: string;
  className?: string;
  children?: readonly Node[];
}

/**
 * Create element with attributes and content
 * @param tagName
 * @param options
 */
export function createElement<K extends keyof HTMLElementTagNameMap>(
  tagName: K,
  options: CreateElementOptions = {}
): HTMLElementTagNameMap[K] {
  const element = document.createElement(tagName);
  const { attributes, textContent, className, children } = options;

  if (className) {
    element.className = className;
  }
  if (textContent) {
    element.textContent = textContent;
  }
  if (attributes) {
    Object.entries(attributes).forEach(([key, value]) => element.setAttribute(key, value));
  }
  if (children) {
    children.forEach(child => element.appendChild(child));
  }

  return element;
}

/**
 * SVG counterpart of `createElement`; numeric attributes are stringified.
 * @param tagName
 * @param attributes
 */
export function createSvgElement<K extends keyof SVGElementTagNameMap>(
  tagName: K,
  attributes: Record<string, string | number> = {}
): SVGElementTagNameMap[K] {
  const element = document.createElementNS(SVG_NS, tagName);
  Object.entries(attributes).forEach(([key, value]) => element.setAttribute(key, String(value)));
  return element;
}

/**
 * Show or hide an element. The inline display is cleared or set too, since the
 * page markup hides some status elements with `style="display: none"`.
 * @param element
 * @param visible
 */
export function setVisible(element: HTMLElement, visible: boolean): void {
  element.hidden = !visible;
  element.style.display = visible ? '' : 'none';
}

/**
 * Anchor opening in a new browsing context
 * @param href
 * @param textContent
 * @param className
 */
export function createExternalLink(href: string, textContent: string, className?: string): HTMLAnchorElement {
  return createElement('a', {
    className,
    textContent,
    attributes: { href, target: '_blank', rel: 'noopener noreferrer' }
  });
}
