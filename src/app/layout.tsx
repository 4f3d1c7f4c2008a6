import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Hinglish Podcast Studio",
  description: "Turn any document, image or Wikipedia topic into a two-voice Hinglish podcast.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
