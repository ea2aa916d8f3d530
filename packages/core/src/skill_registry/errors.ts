/**
 * Custom Error Classes for the skill registry
 */

/**
 * Base error class for all skill-related errors
 */
export class SkillError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SkillError';
    Object.setPrototypeOf(this, SkillError.prototype);
  }
}

/**
 * Raised by the task engine when a task names a skill nobody registered.
 * Registry lookups themselves return undefined.
 */
export class SkillNotFoundError extends SkillError {
  public readonly skillName: string;

  constructor(skillName: string) {
    super(`Skill not found: ${skillName}`);
    this.name = 'SkillNotFoundError';
    this.skillName = skillName;
    Object.setPrototypeOf(this, SkillNotFoundError.prototype);
  }
}

export class SkillParameterError extends SkillError {
  public readonly skillName: string;
  public readonly details: string[];

  constructor(skillName: string, details: string[]) {
    super(`Invalid parameters for skill '${skillName}': ${details.join('; ')}`);
    this.name = 'SkillParameterError';
    this.skillName = skillName;
    this.details = details;
    Object.setPrototypeOf(this, SkillParameterError.prototype);
  }
}
