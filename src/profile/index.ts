export { Profile, DEFAULT_PROFILE_DEFINITION, PROFILE_TYPES, validateProfileDefinition } from './Profile.js';
export type {
  ProfileType,
  ProfileDefinition,
  ProfileDefinitionInput,
  TopSurfaceDefinition,
  BottomSurfaceDefinition,
  HomingDefinition,
  HomingGeometry,
} from './Profile.js';
