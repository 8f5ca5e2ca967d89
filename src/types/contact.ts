export const CONTACT_FIELDS = [
  "lastName",
  "firstName",
  "patronymic",
  "organization",
  "workPhone",
  "personalPhone",
] as const;

export type ContactField = (typeof CONTACT_FIELDS)[number];

export const TEXT_FIELDS: readonly ContactField[] = [
  "lastName",
  "firstName",
  "patronymic",
  "organization",
];

export const PHONE_FIELDS: readonly ContactField[] = [
  "workPhone",
  "personalPhone",
];

export type ContactFields = Record<ContactField, string>;

/**
 * One phonebook row. `id` is the record's 1-based position and is rewritten
 * on every save, so it is only meaningful right after a load or a save.
 */
export type ContactRecord = ContactFields & {
  id: number;
};

/** Raw values as collected from a caller; absent fields were not supplied. */
export type ContactInput = Partial<Record<ContactField, string>>;

export const ID_LABEL = "ID";

export const CONTACT_FIELD_LABELS: Record<ContactField, string> = {
  lastName: "Фамилия",
  firstName: "Имя",
  patronymic: "Отчество",
  organization: "Организация",
  workPhone: "Телефон рабочий",
  personalPhone: "Телефон личный",
};

export const PHONEBOOK_HEADER: readonly string[] = [
  ID_LABEL,
  ...CONTACT_FIELDS.map((field) => CONTACT_FIELD_LABELS[field]),
];
