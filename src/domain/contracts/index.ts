export { isAttributeSource, isNonBlank, collectAttributes } from './IAttributeSource';

export type {
  IAttributeSource,
  AttributeInput,
  AttributeRecord,
} from './IAttributeSource';
