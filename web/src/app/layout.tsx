import "./globals.css";
import type { ReactNode } from "react";
import { Toaster } from "sonner";

export const metadata = {
  title: "Panel Configurator",
  description: "Lay out devices on electrical panels",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body>
        {children}
        <Toaster richColors position="bottom-right" />
      </body>
    </html>
  );
}
