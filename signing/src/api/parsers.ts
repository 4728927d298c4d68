import {
  CreateDocumentInput,
  CreateTemplateInput,
  FieldPosition,
  RecipientInput,
  SignatureInput,
  TemplateFieldInput,
  TemplateSignerInput,
  ValidationRules,
} from '../types';
import { TemplateDetailsUpdate } from '../core/template-catalog';
import { ValidationError, ValidationIssue } from '../utils/errors';

type JsonObject = Record<string, unknown>;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Collects shape problems so one response reports all of them. */
class BodyReader {
  readonly issues: ValidationIssue[] = [];

  object(value: unknown, path: string): JsonObject {
    if (!isObject(value)) {
      this.issues.push({ path, message: `${path} must be an object` });
      return {};
    }
    return value;
  }

  string(source: JsonObject, key: string, path = key): string {
    const value = source[key];
    if (typeof value !== 'string') {
      this.issues.push({ path, message: `${path} must be a string` });
      return '';
    }
    return value;
  }

  optionalString(source: JsonObject, key: string, path = key): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.string(source, key, path);
  }

  number(source: JsonObject, key: string, path = key): number {
    const value = source[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.issues.push({ path, message: `${path} must be a number` });
      return Number.NaN;
    }
    return value;
  }

  optionalNumber(source: JsonObject, key: string, path = key): number | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.number(source, key, path);
  }

  optionalBoolean(source: JsonObject, key: string, path = key): boolean | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      this.issues.push({ path, message: `${path} must be a boolean` });
      return undefined;
    }
    return value;
  }

  array(source: JsonObject, key: string, path = key): unknown[] {
    const value = source[key];
    if (!Array.isArray(value)) {
      this.issues.push({ path, message: `${path} must be an array` });
      return [];
    }
    return value;
  }

  finish<T>(result: T): T {
    if (this.issues.length > 0) {
      throw new ValidationError(this.issues.length === 1 ? this.issues[0].message : 'Invalid request body', this.issues);
    }
    return result;
  }
}

function readSigner(reader: BodyReader, raw: unknown, path: string): TemplateSignerInput {
  const source = reader.object(raw, path);
  return {
    order: reader.number(source, 'order', `${path}.order`),
    name: reader.string(source, 'name', `${path}.name`),
    color: reader.optionalString(source, 'color', `${path}.color`),
  };
}

function readPosition(reader: BodyReader, raw: unknown, path: string): Partial<FieldPosition> {
  const source = reader.object(raw, path);
  return {
    x: reader.optionalNumber(source, 'x', `${path}.x`),
    y: reader.optionalNumber(source, 'y', `${path}.y`),
    width: reader.optionalNumber(source, 'width', `${path}.width`),
    height: reader.optionalNumber(source, 'height', `${path}.height`),
    page: reader.optionalNumber(source, 'page', `${path}.page`),
  };
}

function readRules(reader: BodyReader, raw: unknown, path: string): ValidationRules | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  const source = reader.object(raw, path);
  return {
    minLength: reader.optionalNumber(source, 'minLength', `${path}.minLength`),
    maxLength: reader.optionalNumber(source, 'maxLength', `${path}.maxLength`),
    pattern: reader.optionalString(source, 'pattern', `${path}.pattern`),
  };
}

function readField(reader: BodyReader, raw: unknown, path: string): TemplateFieldInput {
  const source = reader.object(raw, path);
  return {
    name: reader.string(source, 'name', `${path}.name`),
    type: reader.string(source, 'type', `${path}.type`),
    signerOrder: reader.number(source, 'signerOrder', `${path}.signerOrder`),
    label: reader.optionalString(source, 'label', `${path}.label`),
    placeholder: reader.optionalString(source, 'placeholder', `${path}.placeholder`),
    position: readPosition(reader, source.position, `${path}.position`),
    validationRules: readRules(reader, source.validationRules, `${path}.validationRules`),
    required: reader.optionalBoolean(source, 'required', `${path}.required`),
  };
}

function readSigners(reader: BodyReader, source: JsonObject): TemplateSignerInput[] {
  return reader.array(source, 'signers').map((raw, index) => readSigner(reader, raw, `signers[${index}]`));
}

function readFields(reader: BodyReader, source: JsonObject): TemplateFieldInput[] {
  return reader.array(source, 'fields').map((raw, index) => readField(reader, raw, `fields[${index}]`));
}

function decodePdf(reader: BodyReader, source: JsonObject): Buffer {
  const encoded = reader.string(source, 'pdfBase64').replace(/\s+/g, '');
  if (encoded.length > 0 && !BASE64_PATTERN.test(encoded)) {
    reader.issues.push({ path: 'pdfBase64', message: 'pdfBase64 must be base64 encoded' });
    return Buffer.alloc(0);
  }
  return Buffer.from(encoded, 'base64');
}

export function parseCreateTemplate(body: unknown): CreateTemplateInput {
  const reader = new BodyReader();
  const source = reader.object(body, 'body');
  return reader.finish({
    name: reader.string(source, 'name'),
    description: reader.optionalString(source, 'description'),
    pdf: decodePdf(reader, source),
    signers: readSigners(reader, source),
    fields: readFields(reader, source),
  });
}

export function parseTemplateDetails(body: unknown): TemplateDetailsUpdate {
  const reader = new BodyReader();
  const source = reader.object(body, 'body');
  const update: TemplateDetailsUpdate = {};

  const name = reader.optionalString(source, 'name');
  if (name !== undefined) {
    update.name = name;
  }
  const description = reader.optionalString(source, 'description');
  if (description !== undefined) {
    update.description = description;
  }

  return reader.finish(update);
}

export function parseFieldList(body: unknown): TemplateFieldInput[] {
  const reader = new BodyReader();
  const source = reader.object(body, 'body');
  return reader.finish(readFields(reader, source));
}

export function parseSignerList(body: unknown): TemplateSignerInput[] {
  const reader = new BodyReader();
  const source = reader.object(body, 'body');
  return reader.finish(readSigners(reader, source));
}

function readRecipient(reader: BodyReader, raw: unknown, path: string): RecipientInput {
  const source = reader.object(raw, path);
  return {
    order: reader.number(source, 'order', `${path}.order`),
    email: reader.string(source, 'email', `${path}.email`),
    name: reader.string(source, 'name', `${path}.name`),
  };
}

export function parseCreateDocument(body: unknown): CreateDocumentInput {
  const reader = new BodyReader();
  const source = reader.object(body, 'body');

  const rawExpiry = reader.optionalString(source, 'expiresAt');
  let expiresAt: Date | undefined;
  if (rawExpiry !== undefined) {
    expiresAt = new Date(rawExpiry);
    if (Number.isNaN(expiresAt.getTime())) {
      reader.issues.push({ path: 'expiresAt', message: 'expiresAt must be an ISO-8601 timestamp' });
    }
  }

  return reader.finish({
    templateId: reader.string(source, 'templateId'),
    name: reader.string(source, 'name'),
    recipients: reader
      .array(source, 'recipients')
      .map((raw, index) => readRecipient(reader, raw, `recipients[${index}]`)),
    expiresAt,
  });
}

export function parseCancelReason(body: unknown): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  const reader = new BodyReader();
  const source = reader.object(body, 'body');
  return reader.finish(reader.optionalString(source, 'reason'));
}

export function parseFieldValue(body: unknown): string {
  const reader = new BodyReader();
  const source = reader.object(body, 'body');
  return reader.finish(reader.string(source, 'value'));
}

export function parseSignature(body: unknown): SignatureInput {
  const reader = new BodyReader();
  const source = reader.object(body, 'body');
  return reader.finish({
    signature: reader.string(source, 'signature'),
    certificate: reader.optionalString(source, 'certificate'),
    algorithm: reader.optionalString(source, 'algorithm'),
  });
}
