export { Varint, VARINT_MAX } from "./varint.js";
export type { VarintSize } from "./varint.js";
export {
  PartType,
  partTypeName,
  isKnownPartType,
  encodePart,
  decodePart,
  iterParts,
  readPartHeader,
  encodeMediaPayload,
  splitMediaPayload,
} from "./part.js";
export type { UmpPart, PartTypeValue, PartHeader, DecodePartResult } from "./part.js";
export { CompressionType, OnesieHeaderType, ProxyStatus, HEADER_TYPES_WITHOUT_DATA, jsonPartSchema } from "./schema.js";
export type { PartSchema, OnesieHeader, OnesieCryptoParams, MediaHeader, OnesieInnertubeResponse } from "./schema.js";
export { resolveReaderConfig, parseContinuationMode, ContinuationMode } from "./config.js";
export type { UmpReaderOptions, UmpReaderConfig } from "./config.js";
export {
  UmpError,
  TruncatedInputError,
  ProtocolViolationError,
  UnknownHeaderIdError,
  MissingCryptoParamsError,
  InvalidKeyLengthError,
  AuthenticationFailedError,
  DecompressionFailedError,
  UpstreamError,
} from "./errors.js";
export { OnesieEnvelope, seal, open, splitOnesieKey, ONESIE_KEY_LENGTH } from "./onesie/envelope.js";
export type { SealedEnvelope, SealOptions } from "./onesie/envelope.js";
export { CtrKeystream } from "./onesie/keystream.js";
export { decompress } from "./onesie/compression.js";
export {
  UmpReader,
  collectMedia,
  PartFramer,
  partFramer,
  Dispatcher,
  MediaAssembler,
  isMediaBegin,
  isMediaEnd,
  isOnesieEvt,
  isUmpPart,
} from "./reader/index.js";
export type {
  UmpEvt,
  UmpPartEvt,
  OnesieEvt,
  OnesieHeaderEvt,
  OnesiePlayerResponseEvt,
  OnesieUpstreamErrorEvt,
  OnesieDecompressionErrorEvt,
  OnesieInnertubePartEvt,
  OnesieMediaKeyEvt,
  OnesieDataEvt,
  MediaEvt,
  MediaBeginEvt,
  MediaHeaderEvt,
  MediaChunkEvt,
  MediaEndEvt,
  FinalizedMedia,
  PartFramerState,
  ContinuationInfo,
} from "./reader/index.js";
