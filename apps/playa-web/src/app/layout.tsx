import React from "react";

export const metadata = {
  title: "Playa Locator",
  description: "Where the art car is in Black Rock City",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body>
        <main>{children}</main>
      </body>
    </html>
  );
}
