const DISABLE_STACKTRACE : boolean = true;

export class NcmError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class InvalidFileTypeError    extends NcmError {}
export class InvalidKeyLengthError   extends NcmError {}
export class InvalidInfoLengthError  extends NcmError {}
export class InvalidImageLengthError extends NcmError {}
export class DecryptionError         extends NcmError {}
export class InfoDecodeError         extends NcmError {}
export class DecodingError           extends NcmError {}
export class EncodingError           extends NcmError {}
export class SourceError             extends NcmError {}
export class TruncatedSectionError   extends SourceError {}
export class FilesystemError         extends NcmError {}
