import { ConfigurationError } from "../errors.js";
import { skillsConfigurationSchema } from "../schemas/skills.schemas.js";
import type { Skill } from "../schemas/skills.schemas.js";

/** Catalog of the skills the root can delegate to. Populated at startup, read-only afterwards. */
export class SkillRegistry {
  readonly skillHostEndpointUrl: string;
  private skills = new Map<string, Skill>();

  constructor(skillHostEndpointUrl: string) {
    this.skillHostEndpointUrl = skillHostEndpointUrl;
  }

  /** Validates a skills configuration (typically parsed from JSON) and builds a registry from it */
  static fromConfiguration(config: unknown): SkillRegistry {
    const parsed = skillsConfigurationSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      throw new ConfigurationError(`Invalid skills configuration: ${issues}`);
    }

    const registry = new SkillRegistry(parsed.data.skillHostEndpointUrl);
    for (const skill of parsed.data.skills) {
      registry.register(skill);
    }
    return registry;
  }

  register(skill: Skill) {
    if (this.skills.has(skill.id)) {
      throw new ConfigurationError(`Skill "${skill.id}" is registered more than once`);
    }
    this.skills.set(skill.id, Object.freeze({ ...skill }));
  }

  get(id: string): Skill | undefined {
    return this.skills.get(id);
  }

  /** Like `get()`, but an unregistered id is a configuration error */
  require(id: string): Skill {
    const skill = this.skills.get(id);
    if (!skill) throw new ConfigurationError(`Skill "${id}" is not registered`);
    return skill;
  }

  has(id: string): boolean {
    return this.skills.has(id);
  }

  list(): Skill[] {
    return [...this.skills.values()];
  }
}
