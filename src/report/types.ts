/**
 * Report rendering context
 */

export interface ReportContext {
  /** Spec path or URL as given by the user */
  specSource: string;
  directory: string;
  exclude: string[];
  unusedOnly: boolean;
  /** Collapse file lists longer than three entries */
  truncate: boolean;
  colors: boolean;
  generatedAt: Date;
}
