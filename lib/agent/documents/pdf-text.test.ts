import { describe, expect, it } from "vitest";
import { PdfTextExtractor } from "./pdf-text";

/** Minimal PDF with one Helvetica page per content stream; xref offsets computed. */
function buildPdf(pageStreams: string[]): Uint8Array {
  const pageIds = pageStreams.map((_, i) => 4 + i * 2);
  const objects: string[] = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pageIds.length} >>`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
  ];
  pageStreams.forEach((stream, i) => {
    const contentId = pageIds[i] + 1;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentId} 0 R >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`
    );
  });

  let pdf = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) pdf += `${String(offset).padStart(10, "0")} 00000 n \n`;
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return new TextEncoder().encode(pdf);
}

const textPage = (line: string) => `BT /F1 12 Tf 72 720 Td (${line}) Tj ET`;

describe("PdfTextExtractor", () => {
  it("extracts text page by page, one line per page", async () => {
    const bytes = buildPdf([textPage("page one text"), textPage("page two text")]);

    await expect(new PdfTextExtractor().extract(bytes)).resolves.toBe(
      "page one text\npage two text\n"
    );
  });

  it("returns an empty string for a document without a text layer", async () => {
    const bytes = buildPdf(["0 0 m 100 100 l S"]);

    await expect(new PdfTextExtractor().extract(bytes)).resolves.toBe("");
  });

  it("rejects bytes that are not a PDF", async () => {
    const bytes = new TextEncoder().encode("<html>not a pdf</html>");
    await expect(new PdfTextExtractor().extract(bytes)).rejects.toThrow();
  });
});
