/**
 * Section detection by structural markers: Markdown headings, LaTeX
 * `\section{}` commands and all-caps heading lines. Prose is never used to
 * guess where a section starts.
 */

export type CanonicalSection =
  | 'summary'
  | 'experience'
  | 'education'
  | 'skills'
  | 'projects'
  | 'certifications';

const SECTION_ALIASES: Record<CanonicalSection, string[]> = {
  summary: ['summary', 'professional summary', 'profile', 'objective', 'about', 'about me'],
  experience: [
    'experience',
    'work experience',
    'professional experience',
    'employment',
    'employment history',
    'work history'
  ],
  education: ['education', 'academic background'],
  skills: ['skills', 'technical skills', 'core competencies', 'technologies'],
  projects: ['projects', 'selected projects', 'personal projects'],
  certifications: ['certifications', 'certificates', 'licenses', 'licenses and certifications']
};

export interface DocumentSection {
  name: CanonicalSection | null;
  /** Heading line as written, null for text before the first heading */
  headingLine: string | null;
  heading: string;
  body: string;
  lines: string[];
}

const MARKDOWN_HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const LATEX_SECTION = /^\s*\\section\*?\{([^}]*)\}\s*$/;
const CAPS_HEADING = /^\s*([A-Z][A-Z &/]{2,})\s*:?\s*$/;

/**
 * Canonical name for a heading text, or null
 */
export function canonicalSection(heading: string): CanonicalSection | null {
  const normalized = heading
    .toLowerCase()
    .replace(/[*_:`]/g, '')
    .replace(/&/g, 'and')
    .replace(/\s+/g, ' ')
    .trim();
  for (const [name, aliases] of Object.entries(SECTION_ALIASES)) {
    if (aliases.includes(normalized) && isCanonical(name)) {
      return name;
    }
  }
  return null;
}

function isCanonical(name: string): name is CanonicalSection {
  return Object.prototype.hasOwnProperty.call(SECTION_ALIASES, name);
}

/**
 * Heading text when the line opens a section
 */
function headingOf(line: string): string | null {
  const latex = LATEX_SECTION.exec(line);
  if (latex) return latex[1].trim();

  const markdown = MARKDOWN_HEADING.exec(line);
  if (markdown) {
    const text = markdown[2].trim();
    // Deeper headings (a role inside Experience) only open a section when canonical
    return markdown[1].length <= 2 || canonicalSection(text) ? text : null;
  }

  const caps = CAPS_HEADING.exec(line);
  if (caps && canonicalSection(caps[1])) return caps[1].trim();

  return null;
}

/**
 * Split a document into sections. Joining each section's heading line and
 * body with newlines reproduces the document.
 */
export function splitSections(text: string): DocumentSection[] {
  const sections: DocumentSection[] = [];
  let current: { headingLine: string | null; heading: string; lines: string[] } = {
    headingLine: null,
    heading: '',
    lines: []
  };

  const flush = (): void => {
    if (current.headingLine === null && current.lines.length === 0) return;
    sections.push({
      name: current.headingLine === null ? null : canonicalSection(current.heading),
      headingLine: current.headingLine,
      heading: current.heading,
      body: current.lines.join('\n'),
      lines: current.lines
    });
  };

  for (const line of text.split('\n')) {
    const heading = headingOf(line);
    if (heading === null) {
      current.lines.push(line);
    } else {
      flush();
      current = { headingLine: line, heading, lines: [] };
    }
  }
  flush();

  return sections;
}

export function joinSections(sections: DocumentSection[]): string {
  return sections
    .map(section =>
      (section.headingLine === null ? section.lines : [section.headingLine, ...section.lines]).join('\n')
    )
    .join('\n');
}

/**
 * Canonical sections that are present with a non-empty body
 */
export function presentSections(text: string): Set<CanonicalSection> {
  const present = new Set<CanonicalSection>();
  for (const section of splitSections(text)) {
    if (section.name && section.body.trim()) {
      present.add(section.name);
    }
  }
  return present;
}
