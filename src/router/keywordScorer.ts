import type { ToolDescriptor } from "../tools/types.js";
import { defaultLexicon, type Lexicon } from "./lexicon.js";
import { termSet } from "./text.js";
import type { Scorer } from "./types.js";

const NAME_WEIGHT = 1;
const DESCRIPTION_WEIGHT = 0.5;

type ToolTerms = { name: Set<string>; description: Set<string> };

/**
 * Term-overlap scorer. Each distinct content term of the prompt earns 1 when
 * it appears in the tool name, 0.5 when it only appears in the description or
 * a parameter name; the score is the mean over the prompt's terms.
 */
export class KeywordScorer implements Scorer {
  readonly name = "keyword";
  private readonly lexicon: Lexicon;
  private readonly toolTerms = new WeakMap<ToolDescriptor, ToolTerms>();

  constructor(lexicon: Lexicon = defaultLexicon()) {
    this.lexicon = lexicon;
  }

  private termsFor(tool: ToolDescriptor): ToolTerms {
    let t = this.toolTerms.get(tool);
    if (!t) {
      const description = termSet(tool.description, this.lexicon);
      for (const param of Object.keys(tool.parameterSchema)) {
        for (const term of termSet(param, this.lexicon)) description.add(term);
      }
      t = { name: termSet(tool.name, this.lexicon), description };
      this.toolTerms.set(tool, t);
    }
    return t;
  }

  score(prompt: string, tool: ToolDescriptor): number {
    const promptTerms = termSet(prompt, this.lexicon);
    if (promptTerms.size === 0) return 0;

    const { name, description } = this.termsFor(tool);
    let total = 0;
    for (const term of promptTerms) {
      if (name.has(term)) total += NAME_WEIGHT;
      else if (description.has(term)) total += DESCRIPTION_WEIGHT;
    }
    return total / promptTerms.size;
  }
}
