export type ValidationError = string | null;
export type Validator = (value: string | null | undefined) => ValidationError;

type FieldOptions = {
  isRequired?: boolean;
  fieldName?: string;
};

type TextOptions = FieldOptions & {
  minLength?: number;
  maxLength?: number;
  allowNumbers?: boolean;
  allowSpecialChars?: boolean;
};

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE_PATTERN = /^\+?[1-9]\d{1,14}$/;
const NAME_PATTERN = /^[a-zA-Z\s'\-.]+$/;
const SPECIAL_CHARS_PATTERN = /[!@#$%^&*(),.?":{}|<>]/;

function isBlank(value: string | null | undefined): value is null | undefined | "" {
  return value === null || value === undefined || value === "";
}

export const Validators = {
  email(value: string | null | undefined, { isRequired = true }: FieldOptions = {}): ValidationError {
    if (isBlank(value)) {
      return isRequired ? "Email is required" : null;
    }
    return EMAIL_PATTERN.test(value) ? null : "Please enter a valid email address";
  },

  password(value: string | null | undefined): ValidationError {
    if (isBlank(value)) {
      return "Password is required";
    }
    if (value.length < 8) {
      return "Password must be at least 8 characters";
    }
    if (!/[A-Z]/.test(value)) {
      return "Password must contain at least one uppercase letter";
    }
    if (!/[a-z]/.test(value)) {
      return "Password must contain at least one lowercase letter";
    }
    if (!/[0-9]/.test(value)) {
      return "Password must contain at least one number";
    }
    return null;
  },

  required(value: string | null | undefined, { fieldName = "This field" }: FieldOptions = {}): ValidationError {
    return isBlank(value) ? `${fieldName} is required` : null;
  },

  phoneNumber(value: string | null | undefined): ValidationError {
    if (isBlank(value)) {
      return "Phone number is required";
    }
    return PHONE_PATTERN.test(value.replace(/[\s-]/g, "")) ? null : "Please enter a valid phone number";
  },

  name(value: string | null | undefined, { isRequired = true, fieldName = "Name" }: FieldOptions = {}): ValidationError {
    const trimmed = value?.trim() ?? "";
    if (!trimmed) {
      return isRequired ? `${fieldName} is required` : null;
    }
    if (!NAME_PATTERN.test(trimmed)) {
      return `${fieldName} can only contain letters, spaces, hyphens, and apostrophes`;
    }
    if (trimmed.length < 2) {
      return `${fieldName} must be at least 2 characters`;
    }
    if (/^['\-.]|['\-.]$/.test(trimmed)) {
      return `${fieldName} cannot start or end with special characters`;
    }
    if (/['\-.]{2,}/.test(trimmed)) {
      return `${fieldName} cannot have consecutive special characters`;
    }
    return null;
  },

  text(value: string | null | undefined, options: TextOptions = {}): ValidationError {
    const { isRequired = true, fieldName = "This field", minLength, maxLength } = options;
    const { allowNumbers = true, allowSpecialChars = true } = options;
    const trimmed = value?.trim() ?? "";
    if (!trimmed) {
      return isRequired ? `${fieldName} is required` : null;
    }
    if (minLength !== undefined && trimmed.length < minLength) {
      return `${fieldName} must be at least ${minLength} characters`;
    }
    if (maxLength !== undefined && trimmed.length > maxLength) {
      return `${fieldName} must be at most ${maxLength} characters`;
    }
    if (!allowNumbers && /\d/.test(trimmed)) {
      return `${fieldName} cannot contain numbers`;
    }
    if (!allowSpecialChars && SPECIAL_CHARS_PATTERN.test(trimmed)) {
      return `${fieldName} cannot contain special characters`;
    }
    return null;
  },

  otp(value: string | null | undefined, length = 6): ValidationError {
    if (isBlank(value)) {
      return "OTP is required";
    }
    if (value.length !== length) {
      return `OTP must be ${length} digits`;
    }
    return /^\d+$/.test(value) ? null : "OTP must contain only numbers";
  },

  minLength(value: string | null | undefined, min: number, { fieldName = "This field" }: FieldOptions = {}): ValidationError {
    if (isBlank(value)) {
      return `${fieldName} is required`;
    }
    return value.length < min ? `${fieldName} must be at least ${min} characters` : null;
  },

  maxLength(value: string | null | undefined, max: number, { fieldName = "This field" }: FieldOptions = {}): ValidationError {
    return value && value.length > max ? `${fieldName} must be at most ${max} characters` : null;
  },

  combine(validators: Validator[], value: string | null | undefined): ValidationError {
    for (const validator of validators) {
      const result = validator(value);
      if (result !== null) {
        return result;
      }
    }
    return null;
  },
};
