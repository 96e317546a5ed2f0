export * from './types';
export * from './coords';
export * from './constants/transform';
export * from './services/transform';
export * from './services/markerMatching';
export * from './services/markerTransfer';
export * from './services/transformSettingsStorage';
export * from './services/logStore';
export * from './utils/transformErrors';
