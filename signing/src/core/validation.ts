import {
  FIELD_TYPES,
  FieldPosition,
  FieldType,
  RecipientInput,
  SnapshotField,
  SnapshotSigner,
  TemplateFieldInput,
  TemplateSignerInput,
  ValidationRules,
} from '../types';
import { RE2JS } from 're2js';
import { ValidationError, ValidationIssue } from '../utils/errors';

export const MAX_NAME_LENGTH = 255;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_VALUE_LENGTH = 10000;
const MAX_PATTERN_LENGTH = 500;

export const DEFAULT_SIGNER_COLORS = [
  '#2563EB',
  '#DC2626',
  '#16A34A',
  '#D97706',
  '#7C3AED',
  '#DB2777',
  '#0891B2',
  '#4B5563',
];

const COLOR_PATTERN = /^#[0-9A-Fa-f]{6}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_PATTERN = /^\+?[0-9][0-9\s().-]{5,19}$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export interface NormalizedSigner {
  order: number;
  name: string;
  color: string;
}

export interface NormalizedField {
  name: string;
  type: FieldType;
  signerOrder: number;
  label: string;
  placeholder: string;
  position: FieldPosition;
  validationRules: ValidationRules;
  required: boolean;
}

export interface NormalizedRecipient {
  order: number;
  email: string;
  name: string;
}

export function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}

function fail(message: string, issues: ValidationIssue[]): never {
  throw new ValidationError(issues.length === 1 ? issues[0].message : message, issues);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateTemplateDetails(name: string, description: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const trimmed = name.trim();

  if (trimmed.length === 0) {
    issues.push({ path: 'name', message: 'name is required' });
  } else if (trimmed.length > MAX_NAME_LENGTH) {
    issues.push({ path: 'name', message: `name must be at most ${MAX_NAME_LENGTH} characters` });
  }

  if (description.length > MAX_DESCRIPTION_LENGTH) {
    issues.push({ path: 'description', message: `description must be at most ${MAX_DESCRIPTION_LENGTH} characters` });
  }

  return issues;
}

export function assertTemplateDetails(name: string, description: string): void {
  const issues = validateTemplateDetails(name, description);
  if (issues.length > 0) {
    fail('Invalid template details', issues);
  }
}

export function normalizeSigners(signers: TemplateSignerInput[]): NormalizedSigner[] {
  const issues: ValidationIssue[] = [];
  const seenOrders = new Set<number>();

  if (signers.length === 0) {
    issues.push({ path: 'signers', message: 'at least one signer is required' });
  }

  const normalized = signers.map((signer, index): NormalizedSigner => {
    const path = `signers[${index}]`;

    if (!isPositiveInteger(signer.order)) {
      issues.push({ path: `${path}.order`, message: 'order must be a positive integer' });
    } else if (seenOrders.has(signer.order)) {
      issues.push({ path: `${path}.order`, message: `order ${signer.order} is used by more than one signer` });
    }
    seenOrders.add(signer.order);

    const name = signer.name.trim();
    if (name.length === 0) {
      issues.push({ path: `${path}.name`, message: 'name is required' });
    } else if (name.length > MAX_NAME_LENGTH) {
      issues.push({ path: `${path}.name`, message: `name must be at most ${MAX_NAME_LENGTH} characters` });
    }

    if (signer.color !== undefined && !COLOR_PATTERN.test(signer.color)) {
      issues.push({ path: `${path}.color`, message: 'color must be a #RRGGBB hex value' });
    }

    return {
      order: signer.order,
      name,
      color: signer.color?.toUpperCase() ?? DEFAULT_SIGNER_COLORS[index % DEFAULT_SIGNER_COLORS.length],
    };
  });

  if (issues.length > 0) {
    fail('Invalid signers', issues);
  }

  return normalized;
}

function validatePosition(
  position: Partial<FieldPosition>,
  totalPages: number,
  path: string,
  issues: ValidationIssue[]
): FieldPosition | null {
  const { x, y, width, height, page } = position;

  if (x === undefined || y === undefined || width === undefined || height === undefined) {
    issues.push({ path, message: 'position requires x, y, width and height' });
    return null;
  }

  const components = { x, y, width, height };
  let valid = true;
  for (const [key, value] of Object.entries(components)) {
    if (!Number.isFinite(value)) {
      issues.push({ path: `${path}.${key}`, message: `${key} must be a finite number` });
      valid = false;
    }
  }

  if (valid && (x < 0 || y < 0)) {
    issues.push({ path, message: 'x and y must be >= 0' });
    valid = false;
  }

  if (valid && (width <= 0 || height <= 0)) {
    issues.push({ path, message: 'width and height must be > 0' });
    valid = false;
  }

  const resolvedPage = page ?? 1;
  if (!isPositiveInteger(resolvedPage) || resolvedPage > totalPages) {
    issues.push({ path: `${path}.page`, message: `page must be an integer between 1 and ${totalPages}` });
    valid = false;
  }

  return valid ? { x, y, width, height, page: resolvedPage } : null;
}

function validateRules(rules: ValidationRules | undefined, path: string, issues: ValidationIssue[]): ValidationRules {
  if (!rules) {
    return {};
  }

  const result: ValidationRules = {};

  if (rules.minLength !== undefined) {
    if (!Number.isInteger(rules.minLength) || rules.minLength < 0) {
      issues.push({ path: `${path}.minLength`, message: 'minLength must be a non-negative integer' });
    } else {
      result.minLength = rules.minLength;
    }
  }

  if (rules.maxLength !== undefined) {
    if (!isPositiveInteger(rules.maxLength)) {
      issues.push({ path: `${path}.maxLength`, message: 'maxLength must be a positive integer' });
    } else {
      result.maxLength = rules.maxLength;
    }
  }

  if (result.minLength !== undefined && result.maxLength !== undefined && result.minLength > result.maxLength) {
    issues.push({ path, message: 'minLength must not exceed maxLength' });
  }

  if (rules.pattern !== undefined) {
    if (rules.pattern.length === 0 || rules.pattern.length > MAX_PATTERN_LENGTH) {
      issues.push({ path: `${path}.pattern`, message: `pattern must be 1-${MAX_PATTERN_LENGTH} characters` });
    } else {
      // RE2 syntax: no backreferences or lookaround.
      try {
        RE2JS.compile(rules.pattern);
        result.pattern = rules.pattern;
      } catch (error) {
        issues.push({
          path: `${path}.pattern`,
          message: `pattern is not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    }
  }

  return result;
}

/**
 * Checks a field set against the signer orders it may reference and the page
 * count of the template PDF.
 */
export function normalizeFields(
  fields: TemplateFieldInput[],
  signerOrders: ReadonlySet<number>,
  totalPages: number
): NormalizedField[] {
  const issues: ValidationIssue[] = [];
  const seenNames = new Set<string>();
  const normalized: NormalizedField[] = [];

  fields.forEach((field, index) => {
    const path = `fields[${index}]`;
    const name = field.name.trim();

    if (name.length === 0) {
      issues.push({ path: `${path}.name`, message: 'name is required' });
    } else if (name.length > MAX_NAME_LENGTH) {
      issues.push({ path: `${path}.name`, message: `name must be at most ${MAX_NAME_LENGTH} characters` });
    } else if (seenNames.has(name)) {
      issues.push({ path: `${path}.name`, message: `field name ${name} is used more than once` });
    }
    seenNames.add(name);

    const type = field.type;
    if (!isFieldType(type)) {
      issues.push({ path: `${path}.type`, message: `type must be one of: ${FIELD_TYPES.join(', ')}` });
    }

    if (!signerOrders.has(field.signerOrder)) {
      issues.push({ path: `${path}.signerOrder`, message: `signer order ${field.signerOrder} does not exist` });
    }

    const position = validatePosition(field.position, totalPages, `${path}.position`, issues);
    const validationRules = validateRules(field.validationRules, `${path}.validationRules`, issues);

    if (position && isFieldType(type)) {
      normalized.push({
        name,
        type,
        signerOrder: field.signerOrder,
        label: (field.label ?? '').trim(),
        placeholder: (field.placeholder ?? '').trim(),
        position,
        validationRules,
        required: field.required ?? true,
      });
    }
  });

  if (issues.length > 0) {
    fail('Invalid fields', issues);
  }

  return normalized;
}

export function normalizeRecipients(recipients: RecipientInput[], signers: SnapshotSigner[]): NormalizedRecipient[] {
  const issues: ValidationIssue[] = [];
  const expectedOrders = new Set(signers.map((signer) => signer.order));
  const seenOrders = new Set<number>();
  const seenEmails = new Set<string>();

  if (signers.length === 0) {
    fail('Template has no signers', [{ path: 'templateId', message: 'template has no signers' }]);
  }

  const normalized = recipients.map((recipient, index): NormalizedRecipient => {
    const path = `recipients[${index}]`;
    const email = recipient.email.trim().toLowerCase();
    const name = recipient.name.trim();

    if (!expectedOrders.has(recipient.order)) {
      issues.push({ path: `${path}.order`, message: `order ${recipient.order} does not match a template signer` });
    } else if (seenOrders.has(recipient.order)) {
      issues.push({ path: `${path}.order`, message: `order ${recipient.order} is assigned more than once` });
    }
    seenOrders.add(recipient.order);

    if (!EMAIL_PATTERN.test(email) || email.length > MAX_NAME_LENGTH) {
      issues.push({ path: `${path}.email`, message: 'email must be a valid address' });
    } else if (seenEmails.has(email)) {
      issues.push({ path: `${path}.email`, message: `email ${email} is used by more than one recipient` });
    }
    seenEmails.add(email);

    if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
      issues.push({ path: `${path}.name`, message: `name must be 1-${MAX_NAME_LENGTH} characters` });
    }

    return { order: recipient.order, email, name };
  });

  for (const order of expectedOrders) {
    if (!seenOrders.has(order)) {
      issues.push({ path: 'recipients', message: `no recipient for signer order ${order}` });
    }
  }

  if (issues.length > 0) {
    fail('Invalid recipients', issues);
  }

  return normalized.sort((a, b) => a.order - b.order);
}

/** Returns the problems with a submitted value; an empty list means it is acceptable. */
export function checkFieldValue(field: SnapshotField, value: string): ValidationIssue[] {
  const path = `fields.${field.name}`;
  const trimmed = value.trim();

  if (trimmed.length === 0) {
    return field.required ? [{ path, message: `${field.name} is required` }] : [];
  }

  if (value.length > MAX_VALUE_LENGTH) {
    return [{ path, message: `${field.name} must be at most ${MAX_VALUE_LENGTH} characters` }];
  }

  const issues: ValidationIssue[] = [];

  switch (field.type) {
    case 'email':
      if (!EMAIL_PATTERN.test(trimmed)) {
        issues.push({ path, message: `${field.name} must be a valid email address` });
      }
      break;
    case 'phone':
      if (!PHONE_PATTERN.test(trimmed)) {
        issues.push({ path, message: `${field.name} must be a valid phone number` });
      }
      break;
    case 'date':
      if (!ISO_DATE_PATTERN.test(trimmed) || Number.isNaN(Date.parse(trimmed))) {
        issues.push({ path, message: `${field.name} must be an ISO-8601 date` });
      }
      break;
    case 'checkbox':
      if (trimmed !== 'true' && trimmed !== 'false') {
        issues.push({ path, message: `${field.name} must be true or false` });
      }
      break;
    case 'signature':
    case 'text':
      break;
  }

  const rules = field.validationRules;
  if (rules.minLength !== undefined && trimmed.length < rules.minLength) {
    issues.push({ path, message: `${field.name} must be at least ${rules.minLength} characters` });
  }
  if (rules.maxLength !== undefined && trimmed.length > rules.maxLength) {
    issues.push({ path, message: `${field.name} must be at most ${rules.maxLength} characters` });
  }
  if (rules.pattern !== undefined && !RE2JS.compile(rules.pattern).matcher(trimmed).find()) {
    issues.push({ path, message: `${field.name} does not match the required format` });
  }

  return issues;
}

export function assertFieldValue(field: SnapshotField, value: string): void {
  const issues = checkFieldValue(field, value);
  if (issues.length > 0) {
    fail('Invalid field value', issues);
  }
}
