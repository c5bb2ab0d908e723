import JSZip from 'jszip';

export type WorkbookSummary = { sheets: string[] };
export type SlidesSummary = { slideCount: number; firstSlideText: string };
export type WordSummary = { wordCount: number; preview: string };

function xmlText(xml: string, tag: string): string[] {
  const pattern = new RegExp(`<${tag}(?:\\s[^>]*)?>([^<]*)</${tag}>`, 'g');
  return [...xml.matchAll(pattern)].map((match) => decodeXmlEntities(match[1]));
}

function decodeXmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

async function readEntry(zip: JSZip, name: string): Promise<string> {
  const entry = zip.file(name);
  if (!entry) {
    throw new Error(`missing ${name} in archive`);
  }
  return entry.async('string');
}

export async function summarizeWorkbook(bytes: Uint8Array): Promise<WorkbookSummary> {
  const zip = await JSZip.loadAsync(bytes);
  const workbook = await readEntry(zip, 'xl/workbook.xml');
  const sheets = [...workbook.matchAll(/<sheet\b[^>]*\bname="([^"]*)"/g)].map((match) => decodeXmlEntities(match[1]));
  return { sheets };
}

export async function summarizeSlides(bytes: Uint8Array): Promise<SlidesSummary> {
  const zip = await JSZip.loadAsync(bytes);
  const slideNames = Object.keys(zip.files).filter((name) => /^ppt\/slides\/slide\d+\.xml$/.test(name));
  const firstSlideText = slideNames.includes('ppt/slides/slide1.xml')
    ? xmlText(await readEntry(zip, 'ppt/slides/slide1.xml'), 'a:t').join(' ').trim()
    : '';
  return { slideCount: slideNames.length, firstSlideText };
}

export async function summarizeWordDocument(bytes: Uint8Array, previewChars = 500): Promise<WordSummary> {
  const zip = await JSZip.loadAsync(bytes);
  const text = xmlText(await readEntry(zip, 'word/document.xml'), 'w:t').join(' ').replace(/\s+/g, ' ').trim();
  return {
    wordCount: text ? text.split(' ').length : 0,
    preview: text.slice(0, previewChars)
  };
}
