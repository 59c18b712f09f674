export { generateRaw, isValid, getTimestamp } from './tsid.js';
export {
	EntityType,
	TYPED_ID_LENGTH,
	generate,
	isValidTypedId,
	type EntityTypeKey,
	type EntityTypePrefix,
} from './typed-id.js';
