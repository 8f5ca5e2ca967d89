import { ContactFields, ContactRecord } from "../types/contact";

export function buildContactFields(
  overrides: Partial<ContactFields> = {},
): ContactFields {
  return {
    lastName: "Иванов",
    firstName: "Иван",
    patronymic: "Иванович",
    organization: "ООО Вектор",
    workPhone: "+7 (495) 111-22-33",
    personalPhone: "+7 (916) 444-55-66",
    ...overrides,
  };
}

const LAST_NAMES = ["Алексеев", "Борисов", "Васильев", "Григорьев", "Дмитриев"];

/** Records with ids 1..count and distinct last names and phones. */
export function buildContactRecords(count: number): ContactRecord[] {
  return Array.from({ length: count }, (_, index) => ({
    id: index + 1,
    ...buildContactFields({
      lastName: LAST_NAMES[index % LAST_NAMES.length],
      workPhone: `+7 (495) 000-00-${String(index + 10).padStart(2, "0")}`,
    }),
  }));
}
