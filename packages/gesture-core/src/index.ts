export * from "./types";
export * from "./config";
export * from "./landmarks";
export * from "./FingerStateExtractor";
export * from "./TemporalSmoother";
export * from "./HandSelector";
export * from "./GestureClassifier";
export * from "./TwoHandTracker";
export * from "./AttentionTracker";
export * from "./EventGate";
export * from "./gaze";
export * from "./synthetic";
export * from "./GestureEngine";
