/**
 * Convert local file content to HTML so it goes through the same block extraction as a wiki page.
 */
export function localFileToHtml(content: string, extension: string): string {
  switch (extension.toLowerCase()) {
    case ".html":
    case ".htm":
      return content;

    case ".md":
      return markdownToHtml(content);

    default:
      return textToHtml(content);
  }
}

/**
 * Lightweight markdown-to-HTML conversion.
 * Handles headers, paragraphs, flat lists and fenced code.
 */
function markdownToHtml(md: string): string {
  const lines = md.split("\n");
  const htmlParts: string[] = [];
  let inCodeBlock = false;
  let codeBuffer: string[] = [];
  let listItems: string[] = [];

  const flushList = () => {
    if (listItems.length === 0) return;
    htmlParts.push(`<ul>${listItems.join("")}</ul>`);
    listItems = [];
  };

  for (const line of lines) {
    // Fenced code blocks
    if (line.startsWith("```")) {
      flushList();
      if (inCodeBlock) {
        htmlParts.push(`<pre><code>${escapeHtml(codeBuffer.join("\n"))}</code></pre>`);
        codeBuffer = [];
        inCodeBlock = false;
      } else {
        inCodeBlock = true;
      }
      continue;
    }

    if (inCodeBlock) {
      codeBuffer.push(line);
      continue;
    }

    // Headers
    const headerMatch = line.match(/^(#{1,6})\s+(.+)$/);
    if (headerMatch) {
      const level = headerMatch[1].length;
      htmlParts.push(`<h${level}>${escapeHtml(headerMatch[2])}</h${level}>`);
      continue;
    }

    // List items
    const itemMatch = line.match(/^\s*(?:[-*+]|\d+\.)\s+(.+)$/);
    if (itemMatch) {
      listItems.push(`<li>${escapeHtml(itemMatch[1])}</li>`);
      continue;
    }
    flushList();

    // Blank lines
    if (line.trim() === "") {
      continue;
    }

    // Regular paragraph
    htmlParts.push(`<p>${escapeHtml(line)}</p>`);
  }

  flushList();

  // Close unclosed code block
  if (inCodeBlock && codeBuffer.length > 0) {
    htmlParts.push(`<pre><code>${escapeHtml(codeBuffer.join("\n"))}</code></pre>`);
  }

  return htmlParts.join("\n");
}

/**
 * Wrap plain text in <p> tags, splitting on blank lines.
 */
function textToHtml(text: string): string {
  return text
    .split(/\n\n+/)
    .filter((p) => p.trim())
    .map((p) => `<p>${escapeHtml(p.trim())}</p>`)
    .join("\n");
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}
