import { DEFAULT_TRANSFORM_SETTINGS, type TransformSettings } from '@/constants/transform';

const STORAGE_KEY = 'map-transfer:transform-settings';
const CURRENT_VERSION = 1;

/** The slice of the Web Storage API the settings need; localStorage satisfies it. */
export interface KeyValueStorage {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
    removeItem(key: string): void;
}

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

const isNonNegative = (value: unknown): value is number => isFiniteNumber(value) && value >= 0;

const isUnitInterval = (value: unknown): value is number =>
    isFiniteNumber(value) && value >= 0 && value <= 1;

interface StoredPayload {
    version: number;
    settings: TransformSettings;
}

/**
 * Load transform settings. Returns null when nothing is stored, the payload is
 * unreadable, or it was written by another version. Individual invalid fields
 * fall back to their defaults.
 */
export const loadTransformSettings = (
    storage: KeyValueStorage | undefined,
): TransformSettings | null => {
    if (!storage) {
        return null;
    }
    try {
        const raw = storage.getItem(STORAGE_KEY);
        if (!raw) {
            return null;
        }
        const parsed: unknown = JSON.parse(raw);
        if (typeof parsed !== 'object' || parsed === null) {
            return null;
        }
        const payload = parsed as Partial<StoredPayload>;
        if (payload.version !== CURRENT_VERSION) {
            return null;
        }
        const settings = payload.settings;
        if (typeof settings !== 'object' || settings === null) {
            return null;
        }

        const defaults = DEFAULT_TRANSFORM_SETTINGS;
        return {
            lambda: isNonNegative(settings.lambda) ? settings.lambda : defaults.lambda,
            useThinPlateSpline:
                typeof settings.useThinPlateSpline === 'boolean'
                    ? settings.useThinPlateSpline
                    : defaults.useThinPlateSpline,
            snapTolerance: isNonNegative(settings.snapTolerance)
                ? settings.snapTolerance
                : defaults.snapTolerance,
            uniqueMatchThreshold: isUnitInterval(settings.uniqueMatchThreshold)
                ? settings.uniqueMatchThreshold
                : defaults.uniqueMatchThreshold,
            candidateMatchThreshold: isUnitInterval(settings.candidateMatchThreshold)
                ? settings.candidateMatchThreshold
                : defaults.candidateMatchThreshold,
            dominantMatchThreshold: isUnitInterval(settings.dominantMatchThreshold)
                ? settings.dominantMatchThreshold
                : defaults.dominantMatchThreshold,
            dominantMatchMargin: isUnitInterval(settings.dominantMatchMargin)
                ? settings.dominantMatchMargin
                : defaults.dominantMatchMargin,
        };
    } catch (error) {
        console.warn('[TransformSettings] Failed to parse stored settings', error);
        return null;
    }
};

export const persistTransformSettings = (
    storage: KeyValueStorage | undefined,
    settings: TransformSettings,
): void => {
    if (!storage) {
        return;
    }
    const payload: StoredPayload = {
        version: CURRENT_VERSION,
        settings,
    };
    storage.setItem(STORAGE_KEY, JSON.stringify(payload));
};

export const clearTransformSettings = (storage: KeyValueStorage | undefined): void => {
    if (!storage) {
        return;
    }
    storage.removeItem(STORAGE_KEY);
};

export const areTransformSettingsDefault = (settings: TransformSettings): boolean => {
    const defaults = DEFAULT_TRANSFORM_SETTINGS;
    return (
        settings.lambda === defaults.lambda &&
        settings.useThinPlateSpline === defaults.useThinPlateSpline &&
        settings.snapTolerance === defaults.snapTolerance &&
        settings.uniqueMatchThreshold === defaults.uniqueMatchThreshold &&
        settings.candidateMatchThreshold === defaults.candidateMatchThreshold &&
        settings.dominantMatchThreshold === defaults.dominantMatchThreshold &&
        settings.dominantMatchMargin === defaults.dominantMatchMargin
    );
};

export const TRANSFORM_SETTINGS_STORAGE_KEY = STORAGE_KEY;
