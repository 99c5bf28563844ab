import { Split, SplitPaths, Variant } from './types';

export const SPLIT_FILES: SplitPaths = {
    train: 'train.csv',
    validation: 'validation.csv',
    test: 'test.csv',
};

export const PREPROCESSOR_FILE = 'preprocessor.bin';

export const WORKING_DIRECTORY_PREFIX = 'temp_';

export const DEFAULT_VARIANTS: Variant[] = [
    { name: 'standardized', scaling: 'standard' },
    { name: 'minmax', scaling: 'minmax' },
];

export function splitFile(split: Split): string {
    return SPLIT_FILES[split];
}
