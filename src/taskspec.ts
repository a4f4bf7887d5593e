/** Marker that switches a dispatch from free prose to a structured task spec. */
export const SPEC_MARKER = "## Spec:";

export const SPEC_TIERS = ["HOTFIX", "FEATURE", "SYSTEM"] as const;

export type SpecTier = (typeof SPEC_TIERS)[number];

export type SpecValidation = {
  tests: string;
  typecheck?: string;
  lint?: string;
};

export type EdgeCase = {
  condition: string;
  outcome: string;
};

export type TaskSpec = {
  name: string;
  tier: SpecTier;
  description: string;
  interface: string[];
  mustDo: string[];
  mustNotDo: string[];
  edgeCases: EdgeCase[];
  preconditions: string[];
  postconditions: string[];
  invariants: string[];
  /** Absent when the spec has no Validation section. */
  validation?: SpecValidation;
  targetPath?: string;
};

export type SpecCheck = { valid: true; spec: TaskSpec } | { valid: false; errors: string[] };

export const MAX_ITERATIONS = 5;

const HEADER_PATTERN = /##\s*Spec:\s*(\w+)\s*\[(\w+)\]/;
const SECTION_PATTERN = /^###\s+(.+)$/gm;
const BULLET_PATTERN = /^-\s+(.+)$/;
const EDGE_CASE_PATTERN = /^-\s*(.+?)\s*(?:→|->)+\s*(.+)$/;
const YAML_BLOCK_PATTERN = /```ya?ml\s*\n([\s\S]+?)```/;

const TIER_GUIDANCE: Record<SpecTier, string> = {
  HOTFIX: "**Tier: HOTFIX** - Minimal scope, fast iteration.\n- Focus on the specific bug only\n- 1-3 targeted tests at most",
  FEATURE:
    "**Tier: FEATURE** - Standard feature work.\n- Full behavior test coverage\n- Every edge case is tested\n- Contract tests for public interfaces",
  SYSTEM:
    "**Tier: SYSTEM** - Comprehensive system component.\n- Exhaustive test coverage\n- Integration tests where several modules meet\n- Contract tests that include the invariants",
};

export function isSpecContent(content: string): boolean {
  return content.trimStart().startsWith(SPEC_MARKER);
}

function tierOf(value: string): SpecTier | undefined {
  return SPEC_TIERS.find((tier) => tier === value);
}

function splitSections(markdown: string): Map<string, string> {
  const sections = new Map<string, string>();
  const matches = [...markdown.matchAll(SECTION_PATTERN)];
  matches.forEach((match, index) => {
    const start = (match.index ?? 0) + match[0].length;
    const end = index + 1 < matches.length ? matches[index + 1].index ?? markdown.length : markdown.length;
    const name = match[1].trim();
    if (!sections.has(name)) sections.set(name, markdown.slice(start, end).trim());
  });
  return sections;
}

function bullets(section: string | undefined): string[] {
  if (!section) return [];
  const items: string[] = [];
  for (const line of section.split("\n")) {
    const match = BULLET_PATTERN.exec(line.trim());
    if (match) items.push(match[1].trim());
  }
  return items;
}

function edgeCases(section: string | undefined): EdgeCase[] {
  if (!section) return [];
  const cases: EdgeCase[] = [];
  for (const line of section.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("-")) continue;
    const match = EDGE_CASE_PATTERN.exec(`- ${trimmed.slice(1).trim()}`);
    if (match) cases.push({ condition: match[1].trim(), outcome: match[2].trim() });
  }
  return cases;
}

/** Reads `tests:`, `typecheck:` and `lint:` from a yaml block, or from plain `key: value` lines. */
function validationFields(section: string): Partial<SpecValidation> {
  const body = YAML_BLOCK_PATTERN.exec(section)?.[1] ?? section;
  const fields: Partial<SpecValidation> = {};
  for (const line of body.split("\n")) {
    const separator = line.indexOf(":");
    if (separator < 0) continue;
    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    if (!value) continue;
    if (key === "tests" || key === "typecheck" || key === "lint") fields[key] = value;
  }
  return fields;
}

function targetPath(section: string | undefined): string | undefined {
  for (const line of section?.split("\n") ?? []) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith("#")) return trimmed;
  }
  return undefined;
}

/** Collects every problem with a spec instead of stopping at the first. */
export function checkSpec(markdown: string): SpecCheck {
  const errors: string[] = [];
  const header = HEADER_PATTERN.exec(markdown);
  let tier: SpecTier | undefined;
  if (!header) {
    errors.push("Invalid spec header. Expected format: '## Spec: FeatureName [TIER]'");
  } else {
    const requested = header[2].toUpperCase();
    tier = tierOf(requested);
    if (!tier) errors.push(`Invalid tier '${requested}'. Valid tiers: ${SPEC_TIERS.join(", ")}`);
  }

  const sections = splitSections(markdown);
  const validationSection = sections.get("Validation");
  let validation: SpecValidation | undefined;
  if (validationSection !== undefined) {
    const fields = validationFields(validationSection);
    if (fields.tests) validation = { ...fields, tests: fields.tests };
    else errors.push("Validation block must specify 'tests' command");
  }

  if (errors.length > 0 || !header || !tier) return { valid: false, errors };

  const start = (header.index ?? 0) + header[0].length;
  const firstSection = /^###\s+/m.exec(markdown.slice(start));
  const description = markdown.slice(start, firstSection ? start + (firstSection.index ?? 0) : undefined).trim();

  return {
    valid: true,
    spec: {
      name: header[1],
      tier,
      description,
      interface: bullets(sections.get("Interface")),
      mustDo: bullets(sections.get("Must Do")),
      mustNotDo: bullets(sections.get("Must Not Do")),
      edgeCases: edgeCases(sections.get("Edge Cases")),
      preconditions: bullets(sections.get("Preconditions")),
      postconditions: bullets(sections.get("Postconditions")),
      invariants: bullets(sections.get("Invariants")),
      validation,
      targetPath: targetPath(sections.get("Target Path")),
    },
  };
}

export function parseSpec(markdown: string): TaskSpec {
  const result = checkSpec(markdown);
  if (!result.valid) throw new Error(`Invalid spec: ${result.errors.join("; ")}`);
  return result.spec;
}

function listSection(title: string, items: string[]): string[] {
  return items.length > 0 ? [`## ${title}`, ...items.map((item) => `- ${item}`), ""] : [];
}

/** The spec rendered back as compact markdown for the agent. */
export function specContext(spec: TaskSpec): string {
  const lines = [`# Specification: ${spec.name}`, `Tier: ${spec.tier}`, "", "## Description", spec.description, ""];
  lines.push(...listSection("Interface", spec.interface));
  lines.push(...listSection("Must Do", spec.mustDo));
  lines.push(...listSection("Must Not Do", spec.mustNotDo));
  lines.push(...listSection("Edge Cases", spec.edgeCases.map((edge) => `${edge.condition} → ${edge.outcome}`)));
  lines.push(...listSection("Preconditions", spec.preconditions));
  lines.push(...listSection("Postconditions", spec.postconditions));
  lines.push(...listSection("Invariants", spec.invariants));
  lines.push("## Validation");
  if (spec.validation) {
    lines.push(`- Tests: ${spec.validation.tests}`);
    if (spec.validation.typecheck) lines.push(`- Typecheck: ${spec.validation.typecheck}`);
    if (spec.validation.lint) lines.push(`- Lint: ${spec.validation.lint}`);
  } else {
    lines.push("- Tests: the project's existing test command");
  }
  if (spec.targetPath) lines.push("", "## Target Path", spec.targetPath);
  return lines.join("\n");
}

/** Implementation brief for a spec: stay on the contract, implement, test, then iterate on validation. */
export function buildSpecPrompt(spec: TaskSpec): string {
  const location = spec.targetPath
    ? `Implementation location: \`${spec.targetPath}\``
    : "Implementation location: pick the module that fits the project layout";
  const validate = spec.validation
    ? `Run validation: \`${spec.validation.tests}\``
    : "Run the project's existing test command.";

  const lines = [
    "# Spec-Driven Implementation",
    "",
    "## STAY ON THE CONTRACT",
    "",
    "The specification below is complete. Do not read documentation, survey conventions or explore directories.",
    "Only read files you import from or that define types named in the interface.",
    "",
    "## CIRCUIT BREAKER",
    "",
    "After 8 file reads without writing code, stop exploring and write the implementation.",
    "",
    "## THE SPECIFICATION",
    "",
    specContext(spec),
    "",
    "## YOUR TASK",
    "",
    TIER_GUIDANCE[spec.tier],
    "",
    "### Step 1: Implement the Interface",
    "",
    location,
    "",
    "1. Follow the interface signatures exactly",
    "2. Handle every edge case as written",
    "3. Check the preconditions and satisfy the postconditions",
    "4. Respect every 'Must Not Do' constraint",
    "",
    "### Step 2: Write Tests",
    "",
    "Use the project's existing test framework and test layout.",
    "- One test for each 'Must Do' item, checking behavior rather than implementation details",
  ];
  if (spec.edgeCases.length > 0) lines.push("- One test for each edge case");
  lines.push("", "### Step 3: Validate", "", validate, "", "Iterate until all tests pass.", `Maximum iterations: ${MAX_ITERATIONS}`);
  return lines.join("\n");
}
