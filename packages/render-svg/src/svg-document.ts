/** SVG user units are output pixels; hundredths are finer than any stroke. */
export function fmt(value: number): string {
  return String(Math.round(value * 100) / 100 + 0);
}

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

/** Escape room labels and ids for text content and attribute values. */
export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

export interface ViewBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Lightweight SVG document builder. No DOM dependency.
 * Layers are emitted as `<g class="layer-…">` in the order first used.
 */
export class SvgDocument {
  private layers: Map<string, string[]> = new Map();
  private style = "";

  constructor(
    private viewBox: ViewBox,
    private background: string = "white",
  ) {}

  setStyle(css: string): void {
    this.style = css;
  }

  addToLayer(layerName: string, svg: string): void {
    if (svg === "") return;
    const layer = this.layers.get(layerName);
    if (layer) {
      layer.push(svg);
    } else {
      this.layers.set(layerName, [svg]);
    }
  }

  toString(): string {
    const { x, y, width, height } = this.viewBox;
    const parts: string[] = [
      `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${fmt(x)} ${fmt(y)} ${fmt(width)} ${fmt(height)}" width="${fmt(width)}" height="${fmt(height)}">`,
    ];

    if (this.style) {
      parts.push(`<style>${this.style}</style>`);
    }

    parts.push(
      `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(width)}" height="${fmt(height)}" fill="${this.background}"/>`,
    );

    for (const [layerName, elements] of this.layers) {
      parts.push(`<g class="layer-${layerName}">`, ...elements, "</g>");
    }

    parts.push("</svg>");
    return parts.join("\n");
  }
}
