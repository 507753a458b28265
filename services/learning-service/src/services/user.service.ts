import logger from '@eduhub/shared/config/logger';
import { isNonEmptyString, isRecord } from '@eduhub/shared/utils/typeGuards';
import { EMAIL_PATTERN, USER_ROLES, parseEntity, userSchema, type User } from '../schemas/entity.schemas';
import { DuplicateKeyError, SchemaValidationError } from '../store/errors';
import { DAY_MS, errorMessage, logOperationFailure, type ServiceContext } from './context';
import { DISPLAY_ID_PREFIXES, avatarUrl, parseDisplaySequence } from './displayId';

export type RegisterStudentInput = {
  firstName: string;
  lastName: string;
  email: string;
  bio?: string;
  skills?: string[];
};

export type ProfileUpdate = {
  bio?: string;
  skills?: string[];
  avatar?: string;
};

export type UserInsertResult = { success: true; id: string } | { success: false; errors: string[] };

const REQUIRED_USER_FIELDS = ['userId', 'email', 'firstName', 'lastName', 'role'] as const;

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && !isNonEmptyString(value));

export class UserService {
  constructor(private readonly ctx: ServiceContext) {}

  validateEmailFormat(email: string): boolean {
    return EMAIL_PATTERN.test(email);
  }

  /**
   * Creates an active student with the next STU_ display ID.
   * Returns null when the write is rejected (invalid data, duplicate email).
   */
  async registerNewStudent(input: RegisterStudentInput): Promise<{ id: string; userId: string } | null> {
    try {
      const { id, displayId } = await this.ctx.ids.insert({
        collection: 'users',
        field: 'userId',
        prefix: DISPLAY_ID_PREFIXES.student,
        build: (userId) => ({
          userId,
          email: input.email,
          firstName: input.firstName,
          lastName: input.lastName,
          role: 'student',
          dateJoined: this.ctx.clock(),
          profile: {
            bio: input.bio ?? '',
            avatar: avatarUrl('student', parseDisplaySequence(DISPLAY_ID_PREFIXES.student, userId) ?? 0),
            skills: input.skills ?? [],
          },
          isActive: true,
        }),
      });
      logger.info('Student registered', { userId: displayId, service: 'learning-service' });
      return { id, userId: displayId };
    } catch (error) {
      logOperationFailure('registerNewStudent', error, { email: input.email });
      return null;
    }
  }

  /**
   * Checks a caller-supplied user document and inserts it. Problems come
   * back as messages instead of exceptions.
   */
  async validateAndInsertUser(input: unknown): Promise<UserInsertResult> {
    const errors = this.validateUser(input);
    if (errors.length > 0 || !isRecord(input)) {
      return { success: false, errors };
    }

    try {
      const id = await this.ctx.store.insertOne('users', input);
      return { success: true, id };
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        return { success: false, errors: [`Duplicate key error: ${error.keyFields.join(', ')}`] };
      }
      if (error instanceof SchemaValidationError) {
        return { success: false, errors: error.messages };
      }
      logOperationFailure('validateAndInsertUser', error);
      return { success: false, errors: [errorMessage(error)] };
    }
  }

  async findAllActiveStudents(): Promise<User[]> {
    const docs = await this.ctx.store.find(
      'users',
      { role: 'student', isActive: true },
      { sort: { userId: 1 }, projection: { _id: 0 } }
    );
    return docs.map((doc) => parseEntity(userSchema, doc));
  }

  async getUserById(userId: string): Promise<User | null> {
    const doc = await this.ctx.store.findOne('users', { userId });
    return doc ? parseEntity(userSchema, doc) : null;
  }

  /** Only the supplied profile fields change */
  async updateUserProfile(userId: string, update: ProfileUpdate): Promise<number> {
    const set: Record<string, unknown> = {};
    if (update.bio !== undefined) set['profile.bio'] = update.bio;
    if (update.skills !== undefined) set['profile.skills'] = update.skills;
    if (update.avatar !== undefined) set['profile.avatar'] = update.avatar;
    if (Object.keys(set).length === 0) {
      return 0;
    }

    try {
      const result = await this.ctx.store.updateOne('users', { userId }, { $set: set });
      return result.modifiedCount;
    } catch (error) {
      logOperationFailure('updateUserProfile', error, { userId });
      return 0;
    }
  }

  /** Soft delete: the user stays retrievable */
  async deactivateUser(userId: string): Promise<number> {
    try {
      const result = await this.ctx.store.updateOne('users', { userId }, { $set: { isActive: false } });
      return result.modifiedCount;
    } catch (error) {
      logOperationFailure('deactivateUser', error, { userId });
      return 0;
    }
  }

  async getUsersJoinedRecently(monthsBack = 6): Promise<User[]> {
    const since = new Date(this.ctx.clock().getTime() - monthsBack * 30 * DAY_MS);
    const docs = await this.ctx.store.find('users', { dateJoined: { $gte: since } }, { sort: { dateJoined: -1 } });
    return docs.map((doc) => parseEntity(userSchema, doc));
  }

  private validateUser(input: unknown): string[] {
    if (!isRecord(input)) {
      return ['User must be an object'];
    }
    const errors = REQUIRED_USER_FIELDS.filter((field) => isBlank(input[field])).map(
      (field) => `Missing required field: ${field}`
    );

    const { email, role } = input;
    if (isNonEmptyString(email) && !this.validateEmailFormat(email)) {
      errors.push('Invalid email format');
    }
    if (role !== undefined && role !== null && !USER_ROLES.some((allowed) => allowed === role)) {
      errors.push("Role must be 'student' or 'instructor'");
    }
    return errors;
  }
}
