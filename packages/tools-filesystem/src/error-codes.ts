/**
 * FileSystem tool error codes
 */
export enum FileSystemErrorCode {
    // File access
    FILE_NOT_FOUND = 'filesystem_file_not_found',
    NOT_A_FILE = 'filesystem_not_a_file',
    FILE_TOO_LARGE = 'filesystem_file_too_large',
    READ_FAILED = 'filesystem_read_failed',
    WRITE_FAILED = 'filesystem_write_failed',

    // Editing
    STRING_NOT_FOUND = 'filesystem_string_not_found',
    STRING_NOT_UNIQUE = 'filesystem_string_not_unique',

    // Search
    INVALID_PATTERN = 'filesystem_invalid_pattern',
    GLOB_FAILED = 'filesystem_glob_failed',
    SEARCH_FAILED = 'filesystem_search_failed',
}
