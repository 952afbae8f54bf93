import type { Config } from "tailwindcss";

export const brand = {
  50: "#eef6ff",
  100: "#d9eaff",
  300: "#93c0fb",
  500: "#3b82f6", // primary
  600: "#2f6fd4",
  700: "#2559aa",
};

const config: Config = {
  content: ["./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        brand,
      },
      boxShadow: {
        card: "0 6px 24px -8px rgba(15,23,42,.12), 0 2px 6px rgba(15,23,42,.04)",
      },
    },
  },
  plugins: [],
};

export default config;
