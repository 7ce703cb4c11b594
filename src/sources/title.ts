export interface ParsedTitle {
  roleTitle: string;
  company: string | null;
}

/**
 * Splits common job-board title formats:
 *   "Analytics Manager at Acme Corp"
 *   "Data Manager @ Acme Corp"
 *   "Data Manager | Acme Corp"
 *   "BI Manager - Acme Corp"
 */
export function splitTitleAndCompany(raw: string): ParsedTitle {
  const title = raw.trim();
  const lower = title.toLowerCase();

  for (const separator of [' at ', ' @ ']) {
    const index = lower.indexOf(separator);
    if (index > 0) {
      return nonEmpty(title.slice(0, index), title.slice(index + separator.length), title);
    }
  }

  const match = title.match(/^(.+?)\s*[|–—-]\s*(.+)$/);
  if (match) {
    return nonEmpty(match[1], match[2], title);
  }

  return { roleTitle: title, company: null };
}

function nonEmpty(role: string, company: string, fallback: string): ParsedTitle {
  const roleTitle = role.trim() || fallback;
  const trimmedCompany = company.trim();
  return { roleTitle, company: trimmedCompany.length > 0 ? trimmedCompany : null };
}

export function stripHtml(text: string): string {
  return text.replace(/<[^>]+>/g, ' ').replace(/\s+/g, ' ').trim();
}
