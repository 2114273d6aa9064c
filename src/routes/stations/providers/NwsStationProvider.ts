import { RawPayload } from "../../../types";
import { isValidCoordinate } from "../geo";
import { InventoryStation, InventoryStationProvider, numberField, textField } from "../StationProvider";

/**
 * NWS observation stations (`[ { id, name, lat, lon, elev } ]`). Some inventory entries have latitude and longitude
 * swapped; those are corrected when only the swapped order is valid.
 */
export class NwsStationProvider extends InventoryStationProvider {
	public readonly providerId = "NWS";
	public readonly providerName = "NWS";
	protected readonly inventoryFile = "nws.json";

	protected toStation( entry: RawPayload ): InventoryStation | undefined {
		const stationId = textField( entry, "id" ).toUpperCase();
		let lat = numberField( entry, "lat" );
		let lon = numberField( entry, "lon" );

		if ( !isValidCoordinate( lat, lon ) ) {
			if ( !isValidCoordinate( lon, lat ) ) {
				return undefined;
			}
			[ lat, lon ] = [ lon, lat ];
		}

		return {
			stationId,
			name: textField( entry, "name" ) || stationId,
			lat,
			lon,
			elevation: numberField( entry, "elev" )
		};
	}
}
