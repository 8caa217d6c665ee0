import type { ReactNode } from "react";
import "./globals.css";

export const metadata = {
  title: "Food Safety Analyzer",
  description: "Photo of a meal → AI check for unsafe ingredients",
};

export default function RootLayout({
  children,
}: {
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
