// Placement and wiring logs are noisy under test; keep console.error visible for debugging
jest.spyOn(console, "log").mockImplementation(() => {});
jest.spyOn(console, "warn").mockImplementation(() => {});
