export { APP_SCHEMA } from './schema';
export { deriveTableName } from './table-name';
export { defineEntity, field, qualifiedTableName } from './entity';
export type {
  EntityDefinition,
  EntityField,
  FieldKind,
  FieldSpec,
  HasDescription,
  HasIdentity,
  HasName,
  HasTimestamps,
} from './entity';
export {
  DESCRIPTION_MAX_LENGTH,
  NAME_MAX_LENGTH,
  descriptionField,
  identityFields,
  nameField,
  newEntityBase,
  timestampFields,
} from './entity-fields';
export {
  PROTECTED_FIELDS,
  describeEntity,
  getColumnNames,
  getRequiredFields,
  toDict,
  touch,
  updateFromDict,
} from './entity-dict';
export type { EntityDict } from './entity-dict';
