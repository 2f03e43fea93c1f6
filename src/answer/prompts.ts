/** Keys the model is asked to fill in. Only the first one is required to store the answer as a setup. */
export const SETUP_PARAMETER_KEYS = [
  "tire_pressure_front",
  "tire_pressure_rear",
  "front_wing_angle",
  "rear_wing_angle",
  "suspension_front_stiffness",
  "suspension_rear_stiffness",
  "camber_front",
  "camber_rear",
  "toe_front",
  "toe_rear",
  "gear_ratios",
  "brake_bias",
] as const;

/** Key whose presence marks a completion body as a setup object. */
export const REQUIRED_SETUP_KEY = SETUP_PARAMETER_KEYS[0];

const SETUP_TEMPLATE = [
  "{",
  ...SETUP_PARAMETER_KEYS.map((key, index) => {
    const value = key === "gear_ratios" ? "[...]" : "value";
    const comma = index < SETUP_PARAMETER_KEYS.length - 1 ? "," : "";
    return `  "${key}": ${value}${comma}`;
  }),
  "}",
].join("\n");

const INSTRUCTIONS = [
  "You are an expert sim racing setup engineer.",
  "Given search results and previously collected setups that may include setup guides or forum posts, extract detailed setup parameters for the car and track in question.",
  "These parameters include (but are not limited to): tire pressures, suspension stiffness, camber, toe, wing angles, gear ratios, brake bias, and any other relevant tuning values.",
  "If the context does NOT contain any setup parameters, provide a complete realistic setup for the specified car, track, and conditions based on your own expertise.",
  "Always output the setup parameters clearly and numerically if possible.",
  "Output the setup parameters as a JSON object with keys such as:",
].join(" ");

export const SETUP_ENGINEER_SYSTEM_PROMPT = `${INSTRUCTIONS}\n${SETUP_TEMPLATE}\nIf any value is unknown, estimate it realistically.`;

export const SETUP_REQUEST_CLOSING = "Please provide the detailed setup parameters or a full expert setup.";
