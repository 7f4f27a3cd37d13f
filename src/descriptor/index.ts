export {
  EMPTY_DESCRIPTOR,
  createDescriptor,
  descriptionFor,
  hasCustomTitle,
  isEnum,
  isReadonly,
  titleFor
} from './descriptor';
export {
  DescriptorDocumentSchema,
  type DescriptorDocument
} from './document-schema';
export {
  createYamlFileDescriptorSource,
  loadDescriptor,
  type DescriptorSource,
  type LoadDescriptorOptions
} from './loader';
export {
  createDescriptorStore,
  openDescriptorStore,
  type DescriptorStore,
  type DescriptorStoreOptions
} from './store';
export { validateWithSchema } from './validator';
