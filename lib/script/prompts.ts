/**
 * Prompt composition for the two-host dialogue script
 *
 * Pure string builders: the instruction block depends only on the host pair,
 * the length targets, the story count and the profanity flag; the data block
 * only on the stories.
 */

import { HostPair, Persona, Story } from '../types';
import { hasWordFloor } from './budget';

export interface SystemPromptOptions {
  hosts: HostPair;
  targetDurationMin: number;
  targetWordCount: number;
  storyCount: number;
  profanityFilter: boolean;
}

export interface ComposedPrompt {
  system: string;
  user: string;
}

export const COLD_OPEN = 'cold_open';
export const KICKER = 'kicker';

export function storySegment(storyId: number): string {
  return `story_${storyId}`;
}

/**
 * Canonical segment names in broadcast order
 */
export function segmentNames(storyCount: number): string[] {
  const stories = Array.from({ length: Math.max(0, storyCount) }, (_, idx) => storySegment(idx));
  return [COLD_OPEN, ...stories, KICKER];
}

function describeHost(host: Persona): string {
  return `**${host.name}**: ${host.personality}
   Speaking style: ${host.style}`;
}

function lengthSection(targetDurationMin: number, targetWordCount: number): string {
  if (!hasWordFloor(targetWordCount)) {
    return `## LENGTH
Aim for roughly ${targetDurationMin} minute(s) of audio. No minimum word count is enforced for this episode, so keep it tight.`;
  }

  return `## LENGTH
Aim for roughly ${targetDurationMin} minute(s) of audio.
WORD COUNT: at least ${targetWordCount} spoken words across all dialogue lines.
- ${targetWordCount} words is a FLOOR, not a ceiling. Running a little long is fine; coming in short is not.
- Citation markers do not count as words.
- If you are short, go deeper on the stories: context, implications, disagreement between the hosts. Never pad with filler.`;
}

function cadenceExamples(hosts: HostPair): string {
  const [a, b] = hosts;
  return `## CADENCE: A CONVERSATION, NOT AN INTERVIEW

Avoid ping-pong Q&A where every line is one short question or answer:
✗ ${a.name}: "What happened?"
✗ ${b.name}: "They launched a new chip."
✗ ${a.name}: "Is it fast?"
✗ ${b.name}: "Yes."

Do this instead, mixing very short reactions with long explanations:
✓ ${a.name}: "Okay." (1 word)
✓ ${b.name}: "So here's the story. The company shipped its new chip this week [src: 0], and the headline number is a forty percent jump in efficiency over last year's part [src: 0]. Which, honestly, sounds too good to be true. But they've had it running with early customers for months [src: 0], so this isn't a slide-deck promise. What gets me is that they did it by rethinking the memory layout instead of just shrinking everything, and that's a bet nobody else in the market is making right now." (long, about 85 words)
✓ ${a.name}: "Wait. Forty percent?" (short interruption)
✓ ${b.name}: "Forty. Percent." (short emphasis)
✓ ${a.name}: "Okay, that's wild. But let me push on it a little, because we've heard efficiency claims before and they don't always survive contact with real workloads. Who is actually buying this, and for what? If it only shines on benchmarks, I'm not sure anyone outside a lab should care." (medium-long, thinking out loud)

Length mix to rotate through:
- 1-3 words: "Huh." "Wait, what?" "Seriously?"
- 5-15 words: quick reactions and setups
- 30-60 words: a medium explanation with some detail
- 70-120 words: a deep dive that builds momentum and connects ideas
Pattern: SHORT → LONG → SHORT → MEDIUM → SHORT → LONG. Let someone finish a thought before the other reacts.`;
}

function outputShape(hosts: HostPair): string {
  const [a, b] = hosts;
  return `## OUTPUT FORMAT
Return ONLY a JSON object with this shape (no markdown, no commentary):
{
  "rundown": [
    {"segment": "cold_open", "duration_estimate": 50},
    {"segment": "story_0", "duration_estimate": 120},
    {"segment": "kicker", "duration_estimate": 35}
  ],
  "dialogue": [
    {"speaker": "${a.name}", "text": "Morning!", "segment": "cold_open", "sources": []},
    {"speaker": "${b.name}", "text": "Big one to start with: the chip story [src: 0], and the numbers are kind of absurd.", "segment": "cold_open", "sources": [0]},
    {"speaker": "${a.name}", "text": "Hold on.", "segment": "story_0", "sources": []}
  ],
  "disclaimer": ""
}
- "rundown": array of {"segment", "duration_estimate" (seconds)} in broadcast order.
- "dialogue": array of {"speaker", "text", "segment", "sources"}. Every line needs all four keys.
- "speaker" must be exactly "${a.name}" or "${b.name}".
- "sources" lists the story ids cited by [src: N] markers in that line ([] when none).
- "disclaimer" is optional.`;
}

export function buildSystemPrompt(options: SystemPromptOptions): string {
  const { hosts, targetDurationMin, targetWordCount, storyCount, profanityFilter } = options;
  const [a, b] = hosts;
  const segments = segmentNames(storyCount);

  const sections = [
    `You're writing a two-host news podcast conversation that flows naturally: two people building on each other's thoughts, not a Q&A and not an interview.`,
    `## THE HOSTS
${describeHost(a)}

${describeHost(b)}

Their personalities must be distinct: word choice, energy and perspective. They see things differently and challenge each other (nicely).`,
    cadenceExamples(hosts),
    `## DEPTH
- Don't just state facts: explore why a story matters, connect it to bigger trends, speculate on implications.
- Show thinking: "So the thing is...", "You know what's interesting about that, though?"
- Natural speech: contractions, the occasional "I mean" or "honestly", interruptions like "Wait—".
- Call back to earlier moments in the episode.`,
    `## SOURCING
Put a citation marker in the exact form [src: <story id>] after every factual claim, e.g.
- "They raised a hundred million dollars [src: 0]"
- "The model is forty percent faster [src: 1]"
Only cite story ids that appear in the story list.`,
    `## STRUCTURE
1. Cold open (45-60 sec): hook and banter.
2. One segment per story: a real deep dive into each.
3. Kicker (30-40 sec): wrap up with a closing thought.
Use exactly these segment names, in this order: ${segments.join(', ')}.
The rundown must include "${segments[0]}" and "${segments[segments.length - 1]}".`,
    lengthSection(targetDurationMin, targetWordCount),
  ];

  if (profanityFilter) {
    sections.push('## LANGUAGE\nKeep it clean: no profanity or crude language.');
  }

  sections.push(outputShape(hosts));

  return sections.join('\n\n');
}

function describeStory(story: Story): string {
  const lines = [
    `## STORY ${story.id}`,
    `**Title**: ${story.title}`,
    `**Source**: ${story.source}`,
    `**Summary**: ${story.summary}`,
    `**URL**: ${story.url}`,
  ];
  if (story.publishedAt) {
    lines.push(`**Published**: ${story.publishedAt}`);
  }
  return lines.join('\n');
}

export function buildUserPrompt(stories: readonly Story[]): string {
  return `Write the episode script using these stories:

${stories.map(describeStory).join('\n\n')}

Reminders:
- Natural back-and-forth with short reactions ("Right", "Exactly", "Wait, what?") between longer explanations.
- Aim for 25-35 dialogue lines per story, not a handful of monologues.
- Every fact gets a [src: N] marker using the story ids above.
- Keep the two hosts distinct in vocabulary and energy.
- Return ONLY valid JSON (no markdown code fences).`;
}

export interface ComposeOptions {
  hosts: HostPair;
  stories: readonly Story[];
  targetDurationMin: number;
  targetWordCount: number;
  profanityFilter: boolean;
}

export function composePrompt(options: ComposeOptions): ComposedPrompt {
  const { stories, ...rest } = options;
  return {
    system: buildSystemPrompt({ ...rest, storyCount: stories.length }),
    user: buildUserPrompt(stories),
  };
}
