import { DEFAULT_REMASTER_TITLE, UNKNOWN_GROUP, isKnownEdition } from "../ahd-metadata.js";
import type { FileField, FormField, TextField, UploadAttributes, UploadForm } from "../types.js";

export interface AssembleUploadFormInput {
  attributes: UploadAttributes;
  imdbId: string;
  torrent: {
    fileName: string;
    content: Uint8Array;
  };
  mediaInfo: string;
  releaseDescription: string;
}

const ON = "on";

function text(value: string): TextField {
  const field: TextField = { kind: "text", value };
  return Object.freeze(field);
}

export function assembleUploadForm(input: AssembleUploadFormInput): UploadForm {
  const { attributes } = input;
  const torrent: FileField = {
    kind: "file",
    fileName: input.torrent.fileName,
    content: input.torrent.content.slice(),
  };

  const fields: Record<string, FormField> = {
    submit: text("true"),
    file_input: Object.freeze(torrent),
    nfo_input: text(""),
    type: text(attributes.contentType),
    imdblink: text(input.imdbId),
    file_media: text(""),
    pastelog: text(input.mediaInfo),
    group: text(attributes.group),
    remaster_title: text(DEFAULT_REMASTER_TITLE),
    othereditions: text(""),
    media: text(attributes.mediaType),
    encoder: text(attributes.codec),
    release_desc: text(input.releaseDescription),
  };

  if (attributes.group === UNKNOWN_GROUP) {
    fields.unknown_group = text(ON);
    fields.group = text("");
  }

  if (attributes.userRelease) {
    fields.user = text(ON);
  }

  const edition = attributes.specialEdition;
  if (edition !== undefined && edition.length > 0) {
    fields.remaster = text(ON);
    if (isKnownEdition(edition)) {
      fields.remaster_title = text(edition);
    } else {
      fields.othereditions = text(edition);
      fields.unknown = text(ON);
    }
  }

  return Object.freeze(fields);
}
