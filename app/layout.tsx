import "./globals.css";
import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "AI Quiz Master",
  description: "Trivia quiz with AI-generated explanations",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body className="min-h-screen">
        <div className="max-w-3xl mx-auto px-4 py-6">{children}</div>
      </body>
    </html>
  );
}
