export { PopplerPdf, parsePdfInfo, type PdfInfo } from './poppler-pdf.js';
export type { ExportPage, PdfBackend, PdfDocumentHandle, PdfExporter } from './types.js';
