export * from "./types/contact";
export * from "./utils/result";
export { countPages, page } from "./utils/paginate";
export * from "./services/contactErrors";
export {
  validateContactInput,
  validateContactOverrides,
  validatePhone,
  validateString,
} from "./services/contactValidator";
export { loadContacts, saveContacts } from "./services/contactFile";
export {
  addContact,
  ContactStore,
  editContact,
  findContact,
} from "./services/contactStore";
export type { ContactRepository } from "./services/contactStore";
export { searchContacts } from "./services/contactSearch";
export { dispatch } from "./services/directoryDispatcher";
export type {
  DirectoryCommand,
  DirectoryResponse,
} from "./services/directoryDispatcher";
export { formatContact, runConsole } from "./services/directoryConsole";
export type { ConsoleOptions } from "./services/directoryConsole";
export { loadConfig } from "./config";
export type { PhonebookConfig } from "./config";
