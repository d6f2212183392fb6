import { z } from 'zod';
import { ConditionResult } from '../../domain/condition-result.js';
import type { ContextObject, TypeSchema } from '../../domain/context-object.js';
import type { IConditionChecker } from '../services/condition-checker.js';
import { assertNever } from '../../runtime/type-helpers.js';
import { SubjectValidator } from './subject-validator.js';
import type { DescribedCondition } from './condition-handlers.js';

/**
 * General-purpose kinds that most entities can be checked against.
 */
export enum GeneralValidatorKinds {
  HasId = 'HasId',
  HasName = 'HasName',
  IsEnabled = 'IsEnabled',
  IsDisabled = 'IsDisabled',
  HasOwner = 'HasOwner',
  IsLinkedToEntity = 'IsLinkedToEntity',
  IsActive = 'IsActive',
  IsArchived = 'IsArchived',
  HasCreatedDate = 'HasCreatedDate',
  HasUpdatedDate = 'HasUpdatedDate',
  HasValidUri = 'HasValidUri',
  HasDescription = 'HasDescription',
  HasCategory = 'HasCategory',
  IsVerified = 'IsVerified',
  HasTags = 'HasTags',
  HasPermissions = 'HasPermissions',
  IsInUserClaims = 'IsInUserClaims',
  HasParent = 'HasParent',
  HasChildren = 'HasChildren',
  HasValidEmail = 'HasValidEmail',
  HasPhone = 'HasPhone',
  IsPublic = 'IsPublic',
  IsPrivate = 'IsPrivate',
  IsDefault = 'IsDefault',
  IsRequired = 'IsRequired',
  IsEditable = 'IsEditable',
  IsDeletable = 'IsDeletable',
  IsValidState = 'IsValidState',
  HasValidStatus = 'HasValidStatus',
  IsSystemDefined = 'IsSystemDefined',
}

type GeneralCheck = { readonly kind: GeneralValidatorKinds; readonly property: string; readonly message: string } & (
  | { readonly check: 'exists' }
  | { readonly check: 'boolean'; readonly expected: boolean }
  | { readonly check: 'collection' }
  | { readonly check: 'uri' }
  | { readonly check: 'email' }
);

const K = GeneralValidatorKinds;

const GENERAL_CHECKS: readonly GeneralCheck[] = [
  { kind: K.HasId, check: 'exists', property: 'id', message: 'Id is missing' },
  { kind: K.HasName, check: 'exists', property: 'name', message: 'Name is missing' },
  { kind: K.IsEnabled, check: 'boolean', property: 'isEnabled', expected: true, message: 'Object is not enabled' },
  { kind: K.IsDisabled, check: 'boolean', property: 'isEnabled', expected: false, message: 'Object is not disabled' },
  { kind: K.HasOwner, check: 'exists', property: 'ownerId', message: 'Owner is missing' },
  { kind: K.IsLinkedToEntity, check: 'collection', property: 'linkedEntities', message: 'Not linked to any entity' },
  { kind: K.IsActive, check: 'boolean', property: 'isActive', expected: true, message: 'Object is not active' },
  { kind: K.IsArchived, check: 'boolean', property: 'isArchived', expected: true, message: 'Object is not archived' },
  { kind: K.HasCreatedDate, check: 'exists', property: 'createdAt', message: 'Missing created date' },
  { kind: K.HasUpdatedDate, check: 'exists', property: 'updatedAt', message: 'Missing updated date' },
  { kind: K.HasValidUri, check: 'uri', property: 'uri', message: 'Invalid URI' },
  { kind: K.HasDescription, check: 'exists', property: 'description', message: 'Description is missing' },
  { kind: K.HasCategory, check: 'exists', property: 'category', message: 'Category is missing' },
  { kind: K.IsVerified, check: 'boolean', property: 'isVerified', expected: true, message: 'Object is not verified' },
  { kind: K.HasTags, check: 'collection', property: 'tags', message: 'Tags are missing' },
  { kind: K.HasPermissions, check: 'collection', property: 'permissions', message: 'Permissions are missing' },
  { kind: K.IsInUserClaims, check: 'exists', property: 'userClaims', message: 'Not in user claims' },
  { kind: K.HasParent, check: 'exists', property: 'parentId', message: 'Missing parent' },
  { kind: K.HasChildren, check: 'collection', property: 'children', message: 'No children found' },
  { kind: K.HasValidEmail, check: 'email', property: 'email', message: 'Invalid email' },
  { kind: K.HasPhone, check: 'exists', property: 'phone', message: 'Phone is missing' },
  { kind: K.IsPublic, check: 'boolean', property: 'isPublic', expected: true, message: 'Not public' },
  { kind: K.IsPrivate, check: 'boolean', property: 'isPrivate', expected: true, message: 'Not private' },
  { kind: K.IsDefault, check: 'boolean', property: 'isDefault', expected: true, message: 'Not default' },
  { kind: K.IsRequired, check: 'boolean', property: 'isRequired', expected: true, message: 'Not required' },
  { kind: K.IsEditable, check: 'boolean', property: 'isEditable', expected: true, message: 'Not editable' },
  { kind: K.IsDeletable, check: 'boolean', property: 'isDeletable', expected: true, message: 'Not deletable' },
  { kind: K.IsValidState, check: 'exists', property: 'state', message: 'Invalid state' },
  { kind: K.HasValidStatus, check: 'exists', property: 'status', message: 'Invalid status' },
  { kind: K.IsSystemDefined, check: 'boolean', property: 'isSystem', expected: true, message: 'Not system defined' },
];

const UriSchema = z.string().url();
const EmailSchema = z.string().email();

type GeneralContext<TSubject> = ContextObject<string, TSubject>;

/**
 * Property checks over a subject resolved by id.
 *
 * Subjects are read by camelCase property name (`id`, `isEnabled`,
 * `linkedEntities` ...). An absent subject fails every check with that
 * check's message. Subclasses supply `resolve` and may override any leaf check.
 */
export abstract class GeneralValidator<TSubject> extends SubjectValidator<typeof GeneralValidatorKinds, TSubject> {
  protected constructor(checker: IConditionChecker, subjectType: TypeSchema<TSubject>) {
    super(checker, GeneralValidatorKinds, subjectType);
  }

  protected describeConditions(): readonly DescribedCondition<TSubject>[] {
    return GENERAL_CHECKS.map((entry) =>
      this.handler({
        name: `validate${entry.kind}`,
        kinds: GeneralValidatorKinds,
        kind: entry.kind,
        valueType: z.string(),
        handle: (ctx) => this.runCheck(ctx, entry),
      })
    );
  }

  protected initializeConditions(): void {}

  protected validatePropertyExists(ctx: GeneralContext<TSubject>, property: string, message: string): ConditionResult {
    const value = propertyOf(ctx.subject, property);
    return value !== undefined && value !== null
      ? ConditionResult.toSuccess(value)
      : ConditionResult.toFailure(undefined, message);
  }

  protected validateBooleanProperty(
    ctx: GeneralContext<TSubject>,
    property: string,
    expected: boolean,
    message: string
  ): ConditionResult {
    const raw = propertyOf(ctx.subject, property);
    const value = typeof raw === 'boolean' ? raw : undefined;
    return value === expected ? ConditionResult.toSuccess(value) : ConditionResult.toFailure(value, message);
  }

  protected validateCollectionNotEmpty(ctx: GeneralContext<TSubject>, property: string, message: string): ConditionResult {
    const value = propertyOf(ctx.subject, property);
    return hasItems(value) ? ConditionResult.toSuccess(value) : ConditionResult.toFailure(undefined, message);
  }

  /** Absolute URI. */
  protected validateUri(ctx: GeneralContext<TSubject>, property: string, message: string): ConditionResult {
    const value = stringOf(propertyOf(ctx.subject, property));
    return UriSchema.safeParse(value).success
      ? ConditionResult.toSuccess(value)
      : ConditionResult.toFailure(value, message);
  }

  protected validateEmail(ctx: GeneralContext<TSubject>, property: string, message: string): ConditionResult {
    const value = stringOf(propertyOf(ctx.subject, property));
    return EmailSchema.safeParse(value).success
      ? ConditionResult.toSuccess(value)
      : ConditionResult.toFailure(value, message);
  }

  private runCheck(ctx: GeneralContext<TSubject>, entry: GeneralCheck): ConditionResult {
    switch (entry.check) {
      case 'exists':
        return this.validatePropertyExists(ctx, entry.property, entry.message);
      case 'boolean':
        return this.validateBooleanProperty(ctx, entry.property, entry.expected, entry.message);
      case 'collection':
        return this.validateCollectionNotEmpty(ctx, entry.property, entry.message);
      case 'uri':
        return this.validateUri(ctx, entry.property, entry.message);
      case 'email':
        return this.validateEmail(ctx, entry.property, entry.message);
      default:
        return assertNever(entry);
    }
  }
}

function propertyOf(subject: unknown, property: string): unknown {
  if (typeof subject !== 'object' || subject === null) return undefined;
  return Reflect.get(subject, property);
}

function stringOf(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function hasItems(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Set || value instanceof Map) return value.size > 0;
  return false;
}
