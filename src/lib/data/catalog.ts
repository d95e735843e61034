import type { Movement, MicrodoseDefinition } from "../engine/types";

export const seedMovements: Movement[] = [
  {
    id: "kb_swing_2h",
    name: "Kettlebell Swing (2-hand)",
    kind: "kettlebell_swing",
    defaultStyle: { type: "none" },
    tags: ["vo2", "hinge", "posterior_chain"],
    referenceUrl: null,
  },
  {
    id: "burpee",
    name: "Burpee",
    kind: "burpee",
    defaultStyle: { type: "burpee", style: "four_count" },
    tags: ["vo2", "full_body", "bodyweight"],
    referenceUrl: null,
  },
  {
    id: "pullup",
    name: "Pull-up",
    kind: "pullup",
    defaultStyle: { type: "band", band: null },
    tags: ["gtg", "gtg_ok", "upper_body", "pull"],
    referenceUrl: null,
  },
  {
    id: "hip_cars",
    name: "Hip CARs",
    kind: "mobility_drill",
    defaultStyle: { type: "none" },
    tags: ["mobility", "hip", "gtg_ok"],
    referenceUrl: null,
  },
  {
    id: "shoulder_cars",
    name: "Shoulder CARs",
    kind: "mobility_drill",
    defaultStyle: { type: "none" },
    tags: ["mobility", "shoulder", "gtg_ok"],
    referenceUrl: null,
  },
];

export const seedMicrodoses: MicrodoseDefinition[] = [
  {
    id: "emom_kb_swing_5m",
    name: "5-Min EMOM: KB Swings (2-hand)",
    category: "vo2",
    suggestedDurationSeconds: 300,
    gtgFriendly: false,
    referenceUrl: null,
    blocks: [
      {
        movementId: "kb_swing_2h",
        movementStyle: { type: "none" },
        durationHintSeconds: 60,
        metrics: [{ type: "reps", key: "reps", default: 5, min: 3, max: 15, step: 1, progressable: true }],
      },
    ],
  },
  {
    id: "emom_burpee_5m",
    name: "5-Min EMOM: Burpees",
    category: "vo2",
    suggestedDurationSeconds: 300,
    gtgFriendly: false,
    referenceUrl: null,
    blocks: [
      {
        movementId: "burpee",
        movementStyle: { type: "burpee", style: "four_count" },
        durationHintSeconds: 60,
        metrics: [{ type: "reps", key: "reps", default: 3, min: 2, max: 10, step: 1, progressable: true }],
      },
    ],
  },
  {
    id: "gtg_pullup_band",
    name: "GTG: Banded Pull-ups",
    category: "gtg",
    suggestedDurationSeconds: 30,
    gtgFriendly: true,
    referenceUrl: null,
    blocks: [
      {
        movementId: "pullup",
        movementStyle: { type: "band", band: "red" },
        durationHintSeconds: 30,
        metrics: [
          { type: "reps", key: "reps", default: 3, min: 1, max: 8, step: 1, progressable: true },
          { type: "band", key: "band", default: "red", progressable: false },
        ],
      },
    ],
  },
  {
    id: "mobility_hip_cars",
    name: "Hip CARs (3 reps each side)",
    category: "mobility",
    suggestedDurationSeconds: 120,
    gtgFriendly: true,
    referenceUrl: null,
    blocks: [
      {
        movementId: "hip_cars",
        movementStyle: { type: "none" },
        durationHintSeconds: 120,
        metrics: [
          { type: "reps", key: "reps_per_side", default: 3, min: 2, max: 5, step: 1, progressable: false },
        ],
      },
    ],
  },
  {
    id: "mobility_shoulder_cars",
    name: "Shoulder CARs (3 reps each side)",
    category: "mobility",
    suggestedDurationSeconds: 120,
    gtgFriendly: true,
    referenceUrl: null,
    blocks: [
      {
        movementId: "shoulder_cars",
        movementStyle: { type: "none" },
        durationHintSeconds: 120,
        metrics: [
          { type: "reps", key: "reps_per_side", default: 3, min: 2, max: 5, step: 1, progressable: false },
        ],
      },
    ],
  },
];
