/**
 * Cargo.toml fixture strings for manifest tests.
 */

export const VALID_MINIMAL_TOML = `
[package]
name = "demo"
version = "0.1.0"
authors = ["A <a@x.com>"]
description = "d"
license = "MIT"
`;

export const VALID_FULL_TOML = `
[package]
name = "ripgrep-lite"
version = "1.2.0-beta"
edition = "2021"
authors = ["Jane Doe <jane@example.com>", "John Roe <john@example.com>"]
description = "Search files quickly"
license = "MIT/Apache-2.0"
homepage = "https://example.com/rg-lite"
repository = "https://git.example.com/rg-lite"

[dependencies]
regex = "1"

[package.metadata.arch]
pkgrel = "3"
arch = ["x86_64", "aarch64"]
depends = ["glibc"]
makedepends = ["cargo"]
source = ["rg-lite-1.2.0.tar.gz"]
sha256sums = ["SKIP"]
`;

export const TOML_WITH_UNKNOWN_ARCH_KEYS = `
[package]
name = "demo"
version = "0.1.0"
authors = []
description = "d"
license = "MIT"

[package.metadata.arch]
pkgdescr = "typo"
depends = ["glibc"]
makedeps = ["cargo"]
`;

export const TOML_WITH_OTHER_METADATA = `
[package]
name = "demo"
version = "0.1.0"
authors = []
description = "d"
license = "MIT"

[package.metadata.deb]
maintainer = "someone"
`;

export const TOML_MISSING_REQUIRED = `
[package]
name = "demo"
version = "0.1.0"
`;

export const TOML_WRONG_TYPES = `
[package]
name = "demo"
version = "0.1.0"
authors = "A <a@x.com>"
description = "d"
license = "MIT"

[package.metadata.arch]
depends = "glibc"
`;

export const INVALID_TOML_SYNTAX = `
[package]
name = "demo
version = "0.1.0"
`;
