/** Non-fatal warning codes reported through `onWarning`. */
export type ContainerWarningCode =
  | 'ARCHIVE_PATH_TRAVERSAL'
  | 'ARCHIVE_EMPTY_NAME'
  | 'ARCHIVE_UNSUPPORTED_ENTRY'
  | 'CONTAINER_FOOTER_UNREADABLE'
  | 'CONTAINER_CLEANUP_FAILED';

/** Non-fatal event produced while reading or writing a container. */
export type ContainerWarning = {
  code: ContainerWarningCode;
  message: string;
  entryName?: string;
  path?: string;
};

export type WarningHandler = (warning: ContainerWarning) => void;
