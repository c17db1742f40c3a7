const header = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
  '<plist version="1.0">',
]

export const plistDocument = (...body: string[]) => [...header, ...body, "</plist>", ""].join("\n")

export const simplePlist = plistDocument(
  "<dict>",
  "  <key>expires</key>",
  "  <string>2024-03-09</string>",
  "  <key>extra</key>",
  "  <array>",
  "    <string>alpha</string>",
  "    <string>beta</string>",
  "  </array>",
  "  <key>force</key>",
  "  <true/>",
  "  <key>home</key>",
  "  <string>appdata</string>",
  "  <key>lastrun</key>",
  "  <date>2024-03-09T08:05:30Z</date>",
  "  <key>processes</key>",
  "  <integer>8</integer>",
  "</dict>",
)

export const complexPlist = plistDocument(
  "<dict>",
  "  <key>extra</key>",
  "  <array>",
  "    <string>alpha</string>",
  "    <string>beta</string>",
  "  </array>",
  "  <key>extramodule</key>",
  "  <dict>",
  "    <key>unique</key>",
  "    <true/>",
  "  </dict>",
  "  <key>force</key>",
  "  <true/>",
  "  <key>home</key>",
  "  <string>appdata</string>",
  "  <key>processes</key>",
  "  <integer>8</integer>",
  "  <key>worker</key>",
  "  <dict>",
  "    <key>arbitrary</key>",
  "    <dict>",
  "      <key>nesting</key>",
  "      <dict>",
  "        <key>depth</key>",
  "        <string>works</string>",
  "      </dict>",
  "    </dict>",
  "    <key>expires</key>",
  "    <string>2024-03-09</string>",
  "    <key>extra</key>",
  "    <array>",
  "      <string>alpha</string>",
  "      <string>gamma</string>",
  "    </array>",
  "    <key>force</key>",
  "    <false/>",
  "  </dict>",
  "</dict>",
)
