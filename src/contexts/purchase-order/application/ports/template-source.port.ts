export interface TemplateFile {
  buffer: Buffer;
  fileName: string;
}

/**
 * Template Source Port
 * Supplies the bundled template when a request does not upload one
 */
export interface TemplateSourcePort {
  /**
   * Returns null when no bundled template is configured
   */
  loadBundled(): Promise<TemplateFile | null>;
}

export const TEMPLATE_SOURCE_PORT = Symbol('TEMPLATE_SOURCE_PORT');
