import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  reactStrictMode: true,
  // noble and its HCI socket binding are native; keep them out of the server bundle
  serverExternalPackages: [
    "@abandonware/noble",
    "@abandonware/bluetooth-hci-socket",
  ],
};

export default nextConfig;
