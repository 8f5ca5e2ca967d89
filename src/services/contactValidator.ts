import {
  CONTACT_FIELD_LABELS,
  ContactField,
  ContactFields,
  ContactInput,
  PHONE_FIELDS,
  TEXT_FIELDS,
} from "../types/contact";
import { err, ok, Result } from "../utils/result";
import {
  ContactValidationError,
  EmptyFieldError,
  InvalidPhoneFormatError,
} from "./contactErrors";

// +7 (XXX) XXX-XX-XX, nothing else.
const PHONE_PATTERN = /^\+7 \(\d{3}\) \d{3}-\d{2}-\d{2}$/;

export function validateString(
  value: string,
  fieldName: string,
): Result<string, EmptyFieldError> {
  const trimmed = value.trim();
  if (!trimmed) {
    return err(new EmptyFieldError(fieldName));
  }

  return ok(trimmed);
}

export function validatePhone(value: string): boolean {
  return PHONE_PATTERN.test(value);
}

function validateField(
  field: ContactField,
  value: string,
): Result<string, ContactValidationError> {
  const label = CONTACT_FIELD_LABELS[field];

  if (PHONE_FIELDS.includes(field)) {
    return validatePhone(value)
      ? ok(value)
      : err(new InvalidPhoneFormatError(label, value));
  }

  return validateString(value, label);
}

/**
 * Checks a complete set of contact fields. Text fields come back trimmed,
 * phones exactly as given. The first failing field, in column order, wins.
 */
export function validateContactInput(
  input: ContactInput,
): Result<ContactFields, ContactValidationError> {
  const fields: ContactFields = {
    lastName: "",
    firstName: "",
    patronymic: "",
    organization: "",
    workPhone: "",
    personalPhone: "",
  };

  for (const field of [...TEXT_FIELDS, ...PHONE_FIELDS]) {
    const result = validateField(field, input[field] ?? "");
    if (!result.ok) {
      return result;
    }
    fields[field] = result.value;
  }

  return ok(fields);
}

/** Like validateContactInput, but only for the fields present in `input`. */
export function validateContactOverrides(
  input: ContactInput,
): Result<Partial<ContactFields>, ContactValidationError> {
  const overrides: Partial<ContactFields> = {};

  for (const field of [...TEXT_FIELDS, ...PHONE_FIELDS]) {
    const value = input[field];
    if (value === undefined) {
      continue;
    }

    const result = validateField(field, value);
    if (!result.ok) {
      return result;
    }
    overrides[field] = result.value;
  }

  return ok(overrides);
}
