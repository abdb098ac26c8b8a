import type { Config } from "tailwindcss";
import { themeColors } from "./src/config/theme";

export default {
  content: ["./index.html", "./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: themeColors(),
    },
  },
  plugins: [],
} satisfies Config;
