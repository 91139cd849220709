export { Message, TextMessage, ResourceMessage, OR_CONSTRAINT_ID, WITH_MESSAGE_CONSTRAINT_ID, isOrMessage } from './Message';
export type { MessageOrigin, MessageArgs } from './Message';
export { formatTemplate, formatArg } from './MessageFormatter';
export {
  DEFAULT_LOCALE,
  getLocale,
  setLocale,
  withLocale,
  registerBundle,
  setResourceLookup,
  resolveTemplate,
  hasTemplate,
} from './ResourceBundle';
export type { ResourceLookup } from './ResourceBundle';
