/**
 * Utility Profile
 *
 * Naming conventions of the pole-owning utility and the communications
 * providers attached to its poles: owner aliases, classification keywords,
 * provider-specific description labels and relaxed matching families.
 *
 * Profiles are JSON documents under `profiles/`, validated with zod.
 *
 * @module core/profile
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ProfileError } from './errors.js';

// ============================================================================
// Schema
// ============================================================================

const DescriptionRuleSchema = z.object({
  owners: z.array(z.string().min(1)).min(1),
  contains: z.array(z.string().min(1)).default([]),
  label: z.string().min(1),
});

const ProviderFamilySchema = z.object({
  owners: z.array(z.string().min(1)).min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

export const UtilityProfileSchema = z.object({
  name: z.string().min(1),
  utility: z.object({
    name: z.string().min(1),
    matchers: z.array(z.string().min(1)).min(1),
  }),
  ownerAliases: z.record(z.string(), z.array(z.string())).default({}),
  communicationOwners: z.array(z.string().min(1)).default([]),
  communicationCableTypes: z
    .array(z.string().min(1))
    .default(['com', 'fiber', 'telco', 'cable', 'telephone', 'catv']),
  electricalCableTypes: z
    .array(z.string().min(1))
    .default(['neutral', 'secondary', 'primary', 'electric', 'power', 'phase']),
  descriptionRules: z.array(DescriptionRuleSchema).default([]),
  relaxedMatchFamilies: z.array(ProviderFamilySchema).default([]),
});

export type UtilityProfileDefinition = z.infer<typeof UtilityProfileSchema>;

/**
 * Profile definition as written by hand (defaults not yet applied)
 */
export type UtilityProfileInput = z.input<typeof UtilityProfileSchema>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Owner spelling before alias lookup: trimmed, uppercased, `&` spelled out
 */
function baseOwnerForm(owner: string): string {
  return owner.trim().replace(/\s+/g, ' ').toUpperCase().replace(/&/g, 'AND');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  const lower = haystack.toLowerCase();
  return needles.some((needle) => lower.includes(needle.toLowerCase()));
}

/**
 * Party to a relaxed match
 */
export interface MatchCandidate {
  readonly owner: string;
  readonly text: string;
}

// ============================================================================
// Profile
// ============================================================================

export class UtilityProfile {
  readonly definition: UtilityProfileDefinition;
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly neutralPatterns: readonly RegExp[];

  constructor(definition: UtilityProfileDefinition) {
    this.definition = definition;

    const aliases = new Map<string, string>();
    for (const [canonical, spellings] of Object.entries(definition.ownerAliases)) {
      aliases.set(baseOwnerForm(canonical), canonical);
      for (const spelling of spellings) {
        aliases.set(baseOwnerForm(spelling), canonical);
      }
    }
    this.aliases = aliases;

    this.neutralPatterns = [
      /neutral/,
      /primary\s+neutral/,
      /secondary\s+neutral/,
      /power\s+neutral/,
      /electric.*neutral/,
      ...definition.utility.matchers.map(
        (matcher) => new RegExp(`${escapeRegExp(matcher.toLowerCase())}\\s+neutral`)
      ),
    ];
  }

  /**
   * Validate a parsed profile document
   *
   * @throws {ProfileError} If the document does not match the profile schema
   */
  static parse(data: unknown, source = '<inline>'): UtilityProfile {
    const result = UtilityProfileSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.errors[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid profile';
      throw new ProfileError(`Invalid utility profile (${where})`, source);
    }
    return new UtilityProfile(result.data);
  }

  /**
   * Load profile from a JSON file
   */
  static async fromFile(filePath: string): Promise<UtilityProfile> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ProfileError(
        `Cannot read utility profile: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ProfileError(
        `Utility profile is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }
    return UtilityProfile.parse(data, filePath);
  }

  /**
   * Load named profile from the package's profiles directory
   */
  static async fromProfile(profileName: string): Promise<UtilityProfile> {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const profilePath = resolve(__dirname, '../../profiles', `${profileName}.json`);
    return UtilityProfile.fromFile(profilePath);
  }

  /**
   * Load by name, or by path when the argument looks like one
   */
  static async load(nameOrPath: string): Promise<UtilityProfile> {
    if (nameOrPath.endsWith('.json') || nameOrPath.includes('/') || nameOrPath.includes('\\')) {
      return UtilityProfile.fromFile(resolve(nameOrPath));
    }
    return UtilityProfile.fromProfile(nameOrPath);
  }

  get name(): string {
    return this.definition.name;
  }

  /** Normalized owner name of the pole-owning utility */
  get utilityName(): string {
    return this.normalizeOwner(this.definition.utility.name) ?? this.definition.utility.name;
  }

  /**
   * Normalize an owner name; idempotent
   */
  normalizeOwner(owner: string | undefined): string | undefined {
    if (!owner || owner.trim() === '') return undefined;
    const base = baseOwnerForm(owner);
    return this.aliases.get(base) ?? base;
  }

  isUtilityOwner(owner: string | undefined): boolean {
    if (!owner) return false;
    return (
      containsAny(owner, this.definition.utility.matchers) ||
      this.normalizeOwner(owner) === this.utilityName
    );
  }

  isCommunicationOwner(owner: string): boolean {
    return containsAny(owner, this.definition.communicationOwners);
  }

  /**
   * Communications wire: not utility-owned, and either the cable type or the
   * owner names a communications provider
   */
  isCommunication(owner: string, cableType: string): boolean {
    if (!owner || this.isUtilityOwner(owner)) return false;
    return (
      containsAny(cableType, this.definition.communicationCableTypes) ||
      this.isCommunicationOwner(owner)
    );
  }

  /**
   * Utility electrical circuit: utility-owned with an electrical cable type,
   * or utility-owned with no usable cable type
   */
  isUtilityElectrical(owner: string, cableType: string): boolean {
    if (!this.isUtilityOwner(owner)) return false;
    const type = cableType.trim().toLowerCase();
    if (type === '' || type === 'unknown') return true;
    return containsAny(type, this.definition.electricalCableTypes);
  }

  isNeutral(text: string | undefined): boolean {
    if (!text) return false;
    const lower = text.trim().toLowerCase();
    return this.neutralPatterns.some((pattern) => pattern.test(lower));
  }

  /**
   * Display description for an attachment: a provider label when a rule
   * matches, otherwise `<owner> <cable type>`
   */
  formatDescription(owner: string, cableType: string): string {
    const type = cableType.trim().replace(/\s+/g, ' ');
    for (const rule of this.definition.descriptionRules) {
      if (!containsAny(owner, rule.owners)) continue;
      if (rule.contains.length === 0 || containsAny(type, rule.contains)) {
        return rule.label;
      }
    }
    const description = `${owner.trim()} ${type}`.trim();
    return description === '' ? 'Unknown Attachment' : description;
  }

  /**
   * Whether two items belong to one provider family and share a keyword
   */
  sharesProviderFamily(a: MatchCandidate, b: MatchCandidate): boolean {
    return this.definition.relaxedMatchFamilies.some((family) => {
      if (!containsAny(a.owner, family.owners) || !containsAny(b.owner, family.owners)) {
        return false;
      }
      const aText = a.text.toLowerCase();
      const bText = b.text.toLowerCase();
      return family.keywords.some(
        (keyword) => aText.includes(keyword.toLowerCase()) && bText.includes(keyword.toLowerCase())
      );
    });
  }
}
