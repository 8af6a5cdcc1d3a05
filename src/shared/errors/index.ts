export {
  MissionError,
  ValidationError,
  CapacityExceededError,
  BlockedError,
  NoPathError,
  InvalidCellError,
  isMissionError,
  type MissionErrorCode,
} from "./MissionErrors";
