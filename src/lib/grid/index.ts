export { PropertyGrid, FIRST_AUTO_CONTROL_ID } from './PropertyGrid';
export { translateDomEvent, findControlId, ROUTED_DOM_EVENTS } from './eventTranslation';
export type {
  EditState,
  CommitMode,
  PropertyGridOptions,
  PropertyChangedEvent,
  EditorEventNotification,
  EditEndedEvent
} from './types';
