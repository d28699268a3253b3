/**
 * Prompt Library for design-refiner
 *
 * These functions build the prompts that guide the model to:
 * 1. Draw one UML diagram for a requirements slice, in PlantUML
 * 2. Audit a set of diagrams against the slice and score them
 * 3. Write, audit and revise a requirements document (URD -> SRS)
 *
 * Key principle: the model does the judging, these prompts fix the shape of
 * what it sends back so the loop can read it.
 */

import type { ArtifactKind } from '../types/index.js';
import { ARTIFACT_KIND_LABELS } from '../types/index.js';

/**
 * Kind-specific drawing rules appended to every diagram prompt
 */
export const KIND_CONSTRAINTS: Record<ArtifactKind, string> = {
  class: `1. Identify the Attributes (fields) and Operations (methods) for each class
2. Define the Relationships:
   - Use --|> for inheritance
   - Use *-- for composition
   - Use o-- for aggregation
3. Add Multiplicity (e.g., 1..*) to every relationship`,

  sequence: `1. Use autonumber to index the steps
2. Clearly define participants with their roles (actor, participant, database)
3. Use alt/else blocks to handle the "sad paths" (errors and failures) mentioned in the text`,

  activity: `1. Start with: start
2. End with: stop
3. Use :Action description; for activities
4. Use if (condition?) then (yes) ... else (no) ... endif for decisions, merging branches before continuing
5. Do NOT use the legacy (*) start or (*) stop syntax`,

  usecase: `1. Declare every actor named in the text
2. Group use cases inside a rectangle for the system boundary
3. Use <<include>> and <<extend>> only where the text implies them`,

  component: `1. Show each component and the interfaces it provides or requires
2. Use packages or nodes to group components that are deployed together
3. Label every dependency arrow with what flows across it`,

  state: `1. Use [*] for the initial and final states
2. Label every transition with its triggering event and guard, if any
3. Use composite states for nested behaviour`,
};

export interface DiagramPromptInput {
  sliceName: string;
  sliceText: string;
  kind: ArtifactKind;
  /** Source of the previous version of this diagram, to be improved */
  previous?: string | undefined;
  /** Pre-rendered corrections section; present after the first iteration */
  corrections?: string | undefined;
}

/**
 * Builds the prompt for drawing (or redrawing) one diagram of a slice
 */
export function buildDiagramPrompt(input: DiagramPromptInput): string {
  const { sliceName, sliceText, kind, previous, corrections } = input;
  const label = ARTIFACT_KIND_LABELS[kind];

  const previousSection = previous
    ? `
## CURRENT VERSION (improve this, do not copy it)
\`\`\`plantuml
${previous}
\`\`\`
`
    : '';

  return `You are a senior software architect and UML modeling expert. Create a ${label} in PlantUML format for the requirements slice "${sliceName}".

## REQUIREMENTS SLICE: ${sliceName}
${sliceText.trim() || '(no requirement text was provided for this slice)'}

## SCOPE BOUNDARY
Model ONLY what the "${sliceName}" slice describes. Requirements from other slices or sections of the document are out of scope: do not add their classes, actors, messages or steps, even if you can infer them.

## DIAGRAM CONSTRAINTS (${kind})
${KIND_CONSTRAINTS[kind]}
${previousSection}${corrections ?? ''}
## OUTPUT
- Generate ONLY PlantUML code, with no explanations or additional text
- Start with @startuml and end with @enduml
- Use valid PlantUML syntax for ${kind} diagrams

Generate the ${label} now:`;
}

export interface CorrectionsInput {
  overallScore: number;
  gaps: readonly string[];
  scopeViolations: readonly string[];
  recommendations: readonly string[];
}

function numbered(items: readonly string[], empty: string): string {
  if (items.length === 0) return empty;
  return items.map((item, index) => `${index + 1}. ${item}`).join('\n');
}

/**
 * Renders the feedback of the previous QA pass as corrections the next
 * version must make. Entries are kept verbatim, in report order.
 */
export function buildCorrectionsSection(input: CorrectionsInput): string {
  return `
## MANDATORY CORRECTIONS
The previous version scored ${input.overallScore}/10 in QA review. The new version MUST address every item below.

### Identified Gaps
${numbered(input.gaps, 'No gaps identified.')}

### Scope Violations (remove this content)
${numbered(input.scopeViolations, 'No scope violations identified.')}

### Recommendations
${numbered(input.recommendations, 'No specific recommendations provided.')}
`;
}

export interface ValidationDiagram {
  kind: ArtifactKind;
  source: string;
  /** Why generation or compilation failed, if it did */
  failure?: string | undefined;
}

/**
 * Builds the joint QA prompt for one iteration's diagrams
 */
export function buildValidationPrompt(
  sliceName: string,
  sliceText: string,
  diagrams: readonly ValidationDiagram[]
): string {
  const diagramSections = diagrams
    .map((diagram, index) => {
      const header = `### ${index + 1}. ${ARTIFACT_KIND_LABELS[diagram.kind].toUpperCase()}`;
      if (diagram.failure && !diagram.source.trim()) {
        return `${header}\nNot generated. Diagram generation failed: ${diagram.failure}`;
      }
      const failureNote = diagram.failure ? `\nDiagram has errors. Compilation failed: ${diagram.failure}` : '';
      return `${header}${failureNote}\n\`\`\`plantuml\n${diagram.source}\n\`\`\``;
    })
    .join('\n\n');

  return `You are a senior software architect and quality assurance expert. Validate the consistency and quality of UML diagrams generated from a requirements slice.

## REQUIREMENTS SLICE: ${sliceName}
${sliceText.trim() || '(no requirement text was provided for this slice)'}

## GENERATED DIAGRAMS
${diagramSections}

## VALIDATION CRITERIA
1. Consistency: do the diagrams contradict each other? (e.g. the sequence diagram uses classes missing from the class diagram)
2. Completeness: do the diagrams cover every requirement in the slice?
3. Quality: is the PlantUML valid and does it follow UML conventions?
4. Scope adherence: do the diagrams contain anything from outside the "${sliceName}" slice?
5. Gap analysis: what is missing or ambiguous?

## SCORING RULES (apply strictly)
- Start from a base score of 10
- Subtract 5 points for EACH diagram marked "Not generated"
- Subtract 3 points for EACH diagram marked "Diagram has errors" or containing syntax errors
- The overall score cannot go below 0

Examples: all diagrams correct = 10; one missing = 5; one with errors = 7; one missing and one with errors = 2.

## OUTPUT FORMAT
Write your analysis, then end the report with exactly these tags:

<consistency_score: N>
<completeness_score: N>
<quality_score: N>
<scope_adherence_score: N>
<overall_score: N>
<gaps>
- one missing element or ambiguity per line
</gaps>
<scope_violations>
- one out-of-scope element per line, or "none"
</scope_violations>
<recommendations>
- one concrete, actionable change per line
</recommendations>

Every N is a number from 0 to 10. The overall score is the one after penalties.`;
}

/**
 * Builds the prompt that turns a short product brief into a User
 * Requirements Document
 */
export function buildUrdPrompt(brief: string): string {
  return `You are a business analyst writing a User Requirements Document (URD).

## PRODUCT BRIEF
${brief}

## YOUR TASK
Write a complete URD for this product:

1. **Purpose and scope**: what the product is for and who uses it
2. **User classes**: each type of user and their goals
3. **User requirements**: numbered (UR-1, UR-2, ...), each a single testable need written from the user's point of view
4. **Constraints**: regulatory, platform, or business limits the brief implies
5. **Assumptions**: anything you had to assume to fill a gap

Write in plain language; do not design the software. Generate the URD now:`;
}

/**
 * Builds the prompt that turns a URD into a first SRS version
 */
export function buildSrsPrompt(urd: string, standard?: string): string {
  const standardSection = standard
    ? `
## STANDARD REFERENCE
${standard}
`
    : '';

  return `You are a senior software requirements engineer creating a Software Requirements Specification (SRS).

## USER REQUIREMENTS DOCUMENT (URD)
${urd}
${standardSection}
## INSTRUCTIONS
1. Follow the structure of the standard reference${standard ? '' : ' (IEEE 830 layout when none is given)'}
2. Transform every user requirement into technical software requirements
3. Make requirements specific, measurable, achievable, relevant and time-bound
4. Include functional requirements, non-functional requirements and constraints
5. Give every requirement an ID and a priority
6. Keep traceability between user needs and software requirements

The SRS must include:
- Introduction (purpose, scope, definitions, references, overview)
- Overall description (product perspective, functions, user characteristics, constraints, assumptions)
- Specific requirements (functional, performance, design constraints, attributes, external interfaces)

Generate the SRS document now:`;
}

/**
 * Builds the audit prompt for one SRS version. The report must end with
 * an `<errors: N>` tag.
 */
export function buildSrsValidationPrompt(
  urd: string,
  srs: string,
  standard?: string,
  previousReport?: string
): string {
  const standardSection = standard ? `\n## STANDARD REFERENCE\n${standard}\n` : '';
  const previousSection = previousReport
    ? `
## PREVIOUS VALIDATION REPORT
${previousReport}

NOTE: This SRS may be a revised version addressing the previous report. Take into account sections marked as unchanged.
`
    : '';

  return `You work in quality and auditing for software requirements. Validate the SRS below against the URD it was written from.

## USER REQUIREMENTS DOCUMENT (URD)
${urd}

## SOFTWARE REQUIREMENTS SPECIFICATION (SRS) TO VALIDATE
${srs}
${standardSection}${previousSection}
## VALIDATION INSTRUCTIONS
1. **Completeness**: every user requirement is addressed; no required section is missing
2. **Compliance**: the document follows the standard structure; requirements have IDs and priorities
3. **Quality**: no ambiguous, unclear or contradictory requirements; consistent terminology
4. **Traceability**: every software requirement maps to a user need and is testable

## OUTPUT FORMAT
- Executive summary of findings
- Detailed analysis by section
- Missing requirements
- Compliance gaps
- Specific recommendations for improvement
- Clear identification of each problem found

CRITICAL: end the report with a tag giving the total number of problems found, in exactly this format:
<errors: N>

Generate the SRS Validation Report now:`;
}

/**
 * Builds the prompt that revises an SRS using its validation report
 */
export function buildSrsReviewPrompt(srs: string, report: string, version: number): string {
  return `You are the software engineer who wrote the SRS below. The quality and auditing department reviewed it and produced a validation report. Produce version ${version} of the SRS that resolves every issue in the report.

## YOUR CURRENT SRS
${srs}

## VALIDATION REPORT
${report}

## INSTRUCTIONS
1. Address every problem the report identifies; add detail where it finds gaps
2. Keep the document structure and numbering; update the version to ${version}
3. Make requirements more specific, measurable and testable
4. Add any missing sections, IDs, priorities or traceability entries
5. Replace ambiguous language with precise, quantitative statements
6. Add a version history entry noting that this revision addresses validation feedback

Output the complete revised SRS document now:`;
}
