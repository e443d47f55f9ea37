/* ------------------------- Container layout -------------------------- */
export interface SectionDescriptor {
  /** absolute offset within the source */
  readonly start : number;
  /** byte length as stored in the container's u32 field */
  readonly length: number;
}

export interface ContainerSections {
  readonly key  : SectionDescriptor;
  readonly info : SectionDescriptor;
  readonly image: SectionDescriptor;
}

/* ------------------------- Metadata record --------------------------- */
/** `[artist name, artist id]` */
export type ArtistEntry = [name: string, id: number];

export interface NcmInfo {
  /** track title (wire: `musicName`) */
  name     : string;
  /** track id (wire: `musicId`) */
  id       : number;
  album    : string;
  artist   : ArtistEntry[];
  bitrate  : number;
  /** milliseconds */
  duration : number;
  /** container format of the audio payload, e.g. `mp3` or `flac` */
  format   : string;
  mvId?    : number;
  alias?   : string[];
  albumId? : number;
  albumPic?: string;
  transNames?: string[];
}
