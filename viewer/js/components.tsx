/**
 * Controls of the viewer page: header, channel and colormap selects,
 * level readout, isoline toggle, status and notice lines.
 */

import * as React from "react";
import Switch from "@mui/material/Switch";
import Select from "@mui/material/Select";
import MenuItem from "@mui/material/MenuItem";
import Stack from "@mui/material/Stack";
import Typography from "@mui/material/Typography";
import { CONTROL_PANEL, TYPOGRAPHY, colors } from "./CONFIG";
import { COLORMAP_NAMES, type ColormapName } from "./core/colormaps";
import { formatSignificant } from "./core/format";
import type { Notice } from "./core/hooks";
import type { LevelRange } from "./core/levels";
import type { ViewerSnapshot } from "./core/protocol";

// Menus open upward; the controls sit at the bottom of the page
const upwardMenuProps = {
    anchorOrigin: { vertical: "top" as const, horizontal: "left" as const },
    transformOrigin: { vertical: "bottom" as const, horizontal: "left" as const },
    sx: { zIndex: 9999 },
};

function PanelSelect<T extends string>({ label, value, options, onChange, formatLabel }: {
    label: string;
    value: T;
    options: readonly T[];
    onChange: (value: T) => void;
    formatLabel?: (value: T) => string;
}) {
    return (
        <Stack direction="row" spacing={1} alignItems="center" sx={{ ...CONTROL_PANEL.GROUP }}>
            <Typography sx={{ ...TYPOGRAPHY.LABEL }}>{label}:</Typography>
            <Select
                value={value}
                onChange={(e) => {
                    const next = options.find((opt) => opt === e.target.value);
                    if (next !== undefined) onChange(next);
                }}
                size="small"
                sx={{ ...CONTROL_PANEL.SELECT }}
                MenuProps={upwardMenuProps}
            >
                {options.map((opt) => (
                    <MenuItem key={opt} value={opt}>
                        {formatLabel ? formatLabel(opt) : opt}
                    </MenuItem>
                ))}
            </Select>
        </Stack>
    );
}

// ============================================================================
// Header
// ============================================================================
export function ImageHeader({ snapshot, connected }: { snapshot: ViewerSnapshot | null; connected: boolean }) {
    const details = snapshot
        ? `${snapshot.path}  ${snapshot.width}×${snapshot.height}×${snapshot.channelCount}  rev ${snapshot.revision}`
        : "";
    return (
        <Stack direction="row" spacing={1} alignItems="baseline" sx={{ mb: 1 }}>
            <Typography sx={{ ...TYPOGRAPHY.TITLE }}>{snapshot?.title ?? "imview"}</Typography>
            <Typography sx={{ ...TYPOGRAPHY.VALUE }}>
                {details}
                {snapshot && !snapshot.watching ? "  (static)" : ""}
                {connected ? "" : "  disconnected"}
            </Typography>
        </Stack>
    );
}

// ============================================================================
// Channel and colormap
// ============================================================================
export const CHANNEL_CHOICES = ["All", "R", "G", "B"] as const;
export type ChannelChoice = (typeof CHANNEL_CHOICES)[number];

/** Channel a level change applies to; undefined means every color channel. */
export function channelIndex(choice: ChannelChoice): number | undefined {
    const idx = CHANNEL_CHOICES.indexOf(choice) - 1;
    return idx < 0 ? undefined : idx;
}

/** Alpha is not tone mapped, so it is never offered. */
export function ChannelSelect({ value, onChange }: { value: ChannelChoice; onChange: (value: ChannelChoice) => void }) {
    return <PanelSelect label="Channel" value={value} options={CHANNEL_CHOICES} onChange={onChange} />;
}

export function ColormapSelect({ value, onChange }: { value: ColormapName; onChange: (value: ColormapName) => void }) {
    return (
        <PanelSelect
            label="Colormap"
            value={value}
            options={COLORMAP_NAMES}
            onChange={onChange}
            formatLabel={(v) => v.charAt(0).toUpperCase() + v.slice(1)}
        />
    );
}

// ============================================================================
// Levels and isoline
// ============================================================================
interface LevelReadoutProps {
    level: LevelRange | undefined;
    pinned: boolean;
    onReset: () => void;
}

export function LevelReadout({ level, pinned, onReset }: LevelReadoutProps) {
    return (
        <Stack direction="row" spacing={0.5} alignItems="center" sx={{ ...CONTROL_PANEL.GROUP }}>
            <Typography sx={{ ...TYPOGRAPHY.LABEL }}>
                Levels: {level ? `${formatSignificant(level.lo)} – ${formatSignificant(level.hi)}` : ""}
            </Typography>
            {pinned && <Typography sx={{ ...TYPOGRAPHY.LABEL_SMALL, color: colors.accent }}>pinned</Typography>}
            <Typography component="span" onClick={onReset} sx={{ ...CONTROL_PANEL.BUTTON }}>
                Reset
            </Typography>
        </Stack>
    );
}

interface IsolineToggleProps {
    visible: boolean;
    value: number;
    onToggle: (visible: boolean) => void;
}

export function IsolineToggle({ visible, value, onToggle }: IsolineToggleProps) {
    return (
        <Stack direction="row" spacing={0.5} alignItems="center" sx={{ ...CONTROL_PANEL.GROUP }}>
            <Typography sx={{ ...TYPOGRAPHY.LABEL }}>Isoline:</Typography>
            <Switch
                checked={visible}
                onChange={(e) => onToggle(e.target.checked)}
                size="small"
                sx={{
                    '& .MuiSwitch-thumb': { width: 12, height: 12 },
                    '& .MuiSwitch-switchBase': { padding: '4px' },
                }}
            />
            <Typography sx={{ ...TYPOGRAPHY.VALUE, color: visible ? colors.textSecondary : colors.textDim }}>
                {formatSignificant(value)}
            </Typography>
        </Stack>
    );
}

// ============================================================================
// Overlays and messages
// ============================================================================
export function ZoomIndicator({ zoom }: { zoom: number }) {
    return (
        <span style={{
            position: "absolute",
            bottom: 8,
            left: 8,
            color: colors.textPrimary,
            fontSize: 10,
            textShadow: "0 0 3px #000",
            pointerEvents: "none"
        }}>
            {zoom.toFixed(1)}×
        </span>
    );
}

/** Status line under the image; keeps its height while empty. */
export function StatusLine({ text }: { text: string }) {
    return (
        <Typography component="div" className="viewer-status" sx={{ mt: 0.5 }}>
            {text}
        </Typography>
    );
}

export function NoticeLine({ notice, onDismiss }: { notice: Notice; onDismiss: () => void }) {
    return (
        <Typography
            onClick={onDismiss}
            sx={{
                ...TYPOGRAPHY.LABEL,
                mt: 1,
                cursor: "pointer",
                color: notice.level === "warning" ? colors.accentOrange : colors.textSecondary,
            }}
        >
            {notice.text}
        </Typography>
    );
}
